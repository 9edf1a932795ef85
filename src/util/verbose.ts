export const VERBOSE: boolean = process.env.VERBOSE === '1' || process.env.DEBUG === '1';

export function vlog(payload: string | Record<string, unknown>): void {
  if (!VERBOSE) return;
  const base: Record<string, unknown> = { msg: 'debug', ts: Date.now(), pid: process.pid };
  if (typeof payload === 'string') {
    base.text = payload;
  } else {
    Object.assign(base, payload);
  }
  console.log(JSON.stringify(base, (_, v: unknown) => (typeof v === 'bigint' ? v.toString() : v)));
}
