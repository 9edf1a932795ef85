import dotenv from 'dotenv';
import { loadConfig } from '../src/config/index.js';
import { ui } from '../src/cli/ui.js';
import { ingestFiles, type SheetName } from '../src/ingest/loader.js';
import { openStore } from '../src/loans/store.js';
import { createLogger } from '../src/log.js';

function flag(name: string): string | undefined {
  const prefix = `--${name}=`;
  const hit = process.argv.find((a) => a.startsWith(prefix));
  return hit ? hit.slice(prefix.length) : undefined;
}

async function main() {
  dotenv.config({ override: false });
  const cfg = loadConfig({
    overrides: {
      database: flag('db') ? { path: flag('db') } : undefined,
      ingest: {
        ...(flag('customers') ? { customersFile: flag('customers') } : {}),
        ...(flag('loans') ? { loansFile: flag('loans') } : {}),
        ...(process.argv.includes('--strict') ? { onInvalidRow: 'fail' as const } : {}),
      },
    },
  });
  const log = createLogger({ level: cfg.log.level, pretty: cfg.log.pretty });
  const store = openStore(cfg.database.path, log);

  ui.say('Importing customer and loan history', 'title');
  ui.say(`customers: ${cfg.ingest.customersFile}`, 'dim');
  ui.say(`loans:     ${cfg.ingest.loansFile}`, 'dim');

  const bars = new Map<SheetName, ReturnType<typeof ui.bar>>();
  try {
    const summary = await ui.timed('Ingest', () => ingestFiles(store, cfg.ingest, log, (sheet, done, total) => {
      let b = bars.get(sheet);
      if (!b) {
        bars.forEach((other) => other.stop());
        b = ui.bar(total, sheet.padEnd(9));
        bars.set(sheet, b);
      }
      b.update(done);
    }));
    bars.forEach((b) => b.stop());

    ui.table([
      { sheet: 'customers', ...summary.customers },
      { sheet: 'loans', ...summary.loans },
    ]);
    for (const p of summary.problems) ui.say(`${p.sheet} row ${p.row}: ${p.message}`, 'warn');
    ui.say(summary.problems.length ? `Done with ${summary.problems.length} skipped rows` : 'Done', summary.problems.length ? 'warn' : 'success');
  } finally {
    bars.forEach((b) => b.stop());
    store.close();
  }
}

main().catch((e: unknown) => {
  ui.say(e instanceof Error ? e.message : String(e), 'error');
  process.exitCode = 1;
});
