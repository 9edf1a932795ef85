import chalk from 'chalk';
import ora from 'ora';
import logSymbols from 'log-symbols';
import prettyMs from 'pretty-ms';
import cliProgress from 'cli-progress';
import { isTestEnv } from '../util/env.js';

type Style = 'info' | 'success' | 'warn' | 'error' | 'dim' | 'title';

function isQuiet() {
  return process.env.QUIET === '1' || process.argv.includes('--quiet');
}

function isInteractive() {
  return !!process.stdout.isTTY && !process.env.CI && !isQuiet();
}

const noColor = !!process.env.NO_COLOR || process.argv.includes('--no-color') || !isInteractive();
const c = new chalk.Instance({ level: noColor ? 0 : 3 });

function say(msg: string, style: Style = 'info') {
  // Keep Jest runs clean
  if (isTestEnv()) return;
  if (isQuiet() && style !== 'error') return;
  let out: string;
  switch (style) {
    case 'success': out = `${logSymbols.success} ${c.green(msg)}`; break;
    case 'warn': out = `${logSymbols.warning} ${c.yellow(msg)}`; break;
    case 'error': out = `${logSymbols.error} ${c.red(msg)}`; break;
    case 'dim': out = c.gray(msg); break;
    case 'title': out = c.bold(c.cyan(msg)); break;
    default: out = `${logSymbols.info} ${c.cyan(msg)}`; break;
  }
  if (style === 'error') console.error(out);
  else console.log(out);
}

function step(title: string) {
  return ora({ text: title, isEnabled: isInteractive() && !isTestEnv() && !noColor, isSilent: isTestEnv() });
}

function bar(total: number, label = 'Progress') {
  const enabled = isInteractive() && !isTestEnv();
  const b = new cliProgress.SingleBar(
    {
      format: `${c.cyan(label)} {bar} {value}/{total}`,
      barCompleteChar: '█',
      barIncompleteChar: '░',
      hideCursor: true,
    },
    cliProgress.Presets.shades_classic,
  );
  if (enabled) b.start(total, 0);
  return {
    update: (v: number) => { if (enabled) b.update(v); },
    stop: () => { if (enabled) b.stop(); },
  };
}

function table(rows: Array<Record<string, string | number>>) {
  if (isTestEnv()) return;
  if (rows.length === 0) {
    console.log('(none)');
    return;
  }
  const headers = Object.keys(rows[0]);
  const widths = headers.map((h) => Math.max(h.length, ...rows.map((r) => String(r[h] ?? '').length)));
  console.log(headers.map((h, i) => c.bold(h.padEnd(widths[i]))).join('  '));
  for (const r of rows) {
    console.log(headers.map((h, i) => String(r[h] ?? '').padEnd(widths[i])).join('  '));
  }
}

async function timed<T>(label: string, fn: () => Promise<T>): Promise<T> {
  const s = step(label).start();
  const start = Date.now();
  try {
    const res = await fn();
    s.succeed(`${label} ${c.gray('(' + prettyMs(Date.now() - start) + ')')}`);
    return res;
  } catch (e) {
    s.fail(`${label} ${c.gray('(' + prettyMs(Date.now() - start) + ')')} - ${c.red(e instanceof Error ? e.message : String(e))}`);
    throw e;
  }
}

export const ui = { say, step, bar, table, timed };
export default ui;
