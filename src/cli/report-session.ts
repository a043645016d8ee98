/**
 * CLI: Print the markdown summary of a recorded session.
 *
 * Usage: npx tsx src/cli/report-session.ts [logDirectory] [--write]
 *
 * The directory defaults to ACTION_LOG_DIR. With --write the report is also
 * saved as summary.md next to the logs.
 */

import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';

import { loadRecorderConfigFromEnv } from '../config/env.js';
import { readActionLog } from '../log-reader/action-log-reader.js';
import { summarizeRecords } from '../recorder/summary.js';
import { errorMessage } from '../recorder/errors.js';
import { buildSessionReport, writeSessionReport } from '../logging/summary-writer.js';

export interface ReportOptions {
  directory: string;
  write: boolean;
}

export function parseReportArgs(args: readonly string[], env: NodeJS.ProcessEnv, cwd: string): ReportOptions {
  const write = args.includes('--write');
  const positional = args.filter((a) => !a.startsWith('--'));
  const directory = positional[0] ? resolve(cwd, positional[0]) : loadRecorderConfigFromEnv(env, cwd).logDirectory;
  return { directory, write };
}

export async function reportSession(options: ReportOptions): Promise<string> {
  const records = await readActionLog(options.directory);
  const summary = summarizeRecords(records);
  const info = { directory: options.directory };
  if (options.write) {
    await writeSessionReport(summary, info);
  }
  return buildSessionReport(summary, info);
}

async function main(): Promise<void> {
  try {
    const options = parseReportArgs(process.argv.slice(2), process.env, process.cwd());
    process.stdout.write(await reportSession(options));
  } catch (err) {
    process.stderr.write(`report-session: ${errorMessage(err)}\n`);
    process.exitCode = 1;
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  await main();
}
