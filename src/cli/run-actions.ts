/**
 * CLI: Run an action list from stdin JSON, recording every action.
 *
 * Usage: echo '{"actions":[{"type":"goto","url":"https://example.com"}]}' \
 *   | TASK_FILE=./task.txt ACTION_LOG_DIR=./logs npx tsx src/cli/run-actions.ts
 *
 * Reads the task description from TASK_FILE, launches a headless Chromium,
 * executes the actions in order through the recorder and emits JSONL progress
 * events on stdout. The session logs and summary.md land in ACTION_LOG_DIR.
 */

import { chromium, type Browser } from 'playwright';

import { ActionLogRecorder } from '../recorder/action-log-recorder.js';
import { errorMessage } from '../recorder/errors.js';
import { ActionRunner } from '../runner/action-runner.js';
import { runActionList } from '../runner/action-list.js';
import { PlaywrightActionEngine } from '../engines/playwright-engine.js';
import { loadRunConfigFromEnv, type RunConfig } from '../config/env.js';
import { readTaskSource } from '../config/task-source.js';
import { ActionListSchema, type ActionListInput } from '../schemas/action-ref.schema.js';
import { writeSessionReport } from '../logging/summary-writer.js';
import { stderrLogger } from '../logging/operational-logger.js';

// ── helpers ────────────────────────────────────────

function emit(event: Record<string, unknown>): void {
  process.stdout.write(JSON.stringify(event) + '\n');
}

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf-8');
}

// ── main ───────────────────────────────────────────

async function main(): Promise<void> {
  // 1. Configuration and task
  let config: RunConfig;
  let task: string;
  try {
    config = loadRunConfigFromEnv();
    task = await readTaskSource(config.taskFile);
  } catch (err) {
    emit({ type: 'run_error', error: errorMessage(err) });
    process.exitCode = 1;
    return;
  }

  // 2. Action list from stdin
  let input: ActionListInput;
  try {
    input = ActionListSchema.parse(JSON.parse(await readStdin()));
  } catch (err) {
    emit({ type: 'run_error', error: `Invalid action list on stdin: ${errorMessage(err)}` });
    process.exitCode = 1;
    return;
  }

  const headless = input.options?.headless ?? true;
  const timeoutMs = input.options?.timeout ?? 120_000;

  // 3. Launch browser
  let browser: Browser;
  try {
    browser = await chromium.launch({
      headless,
      args: ['--no-sandbox', '--disable-setuid-sandbox'],
    });
  } catch (err) {
    emit({ type: 'run_error', error: `Browser launch failed: ${errorMessage(err)}` });
    process.exitCode = 1;
    return;
  }

  // Closing the browser fails the running action, which ends the session normally
  const openBrowser = browser;
  const timer = setTimeout(() => {
    emit({ type: 'run_error', error: `Run timed out after ${timeoutMs}ms` });
    openBrowser.close().catch((err: unknown) => stderrLogger.warn(`Browser close failed: ${errorMessage(err)}`));
  }, timeoutMs);

  const recorder = new ActionLogRecorder({ logger: stderrLogger });

  try {
    const page = await browser.newPage();

    // 4. Execute inside a session that is always ended
    const { result, summary, sessionId, directory } = await recorder.withSession(config.recorder, async (session) => {
      emit({
        type: 'run_start',
        sessionId: session.id,
        logDirectory: session.directory,
        totalActions: input.actions.length,
      });
      const runner = new ActionRunner(recorder, session, page, stderrLogger);
      const engine = new PlaywrightActionEngine(page, runner);
      const listResult = await runActionList(engine, input.actions, emit);
      return {
        result: listResult,
        summary: recorder.summarize(session),
        sessionId: session.id,
        directory: session.directory,
      };
    });

    const reportPath = await writeSessionReport(summary, { directory, sessionId, task });

    emit({
      type: 'run_complete',
      ok: result.ok,
      completed: result.completed,
      ...(result.abortedAt !== undefined ? { abortedAt: result.abortedAt } : {}),
      byOutcome: summary.byOutcome,
      totalDurationMs: summary.totalDurationMs,
      reportPath,
    });
    if (!result.ok) process.exitCode = 1;
  } catch (err) {
    emit({ type: 'run_error', error: errorMessage(err) });
    process.exitCode = 1;
  } finally {
    clearTimeout(timer);
    await browser.close().catch((err: unknown) => stderrLogger.warn(`Browser close failed: ${errorMessage(err)}`));
  }
}

main().catch((err: unknown) => {
  emit({ type: 'run_error', error: errorMessage(err) });
  process.exitCode = 1;
});
