#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import { getDB } from '../db/db.js';
import { QueueError } from '../core/errors.js';
import { JOB_STATUSES, type JobStatus } from '../core/types.js';
import { enqueue } from './enqueue.js';
import { startWorker } from './worker_cmd.js';
import { printStatus } from './status.js';
import { printList } from './list.js';
import { retryAllFailed, retryJob } from './retry.js';
import { getConfigAll, setConfigKV, unsetConfigKey } from './config_cmd.js';
import { openCliStore } from './store.js';

function parseStatus(value: string): JobStatus {
  const match = JOB_STATUSES.find((s) => s === value);
  if (!match) throw new InvalidArgumentError(`expected one of ${JOB_STATUSES.join('|')}`);
  return match;
}

function parsePositiveInt(value: string) {
  const n = Number(value);
  if (!Number.isInteger(n) || n <= 0) throw new InvalidArgumentError('expected a positive integer');
  return n;
}

/** Print queue errors as one line and exit non-zero. */
function run(action: () => void | Promise<void>) {
  return async () => {
    try {
      await action();
    } catch (err) {
      if (err instanceof Error) {
        console.error(err instanceof QueueError ? `❌ [${err.code}] ${err.message}` : `❌ ${err.message}`);
        process.exitCode = 1;
        return;
      }
      throw err;
    }
  };
}

const program = new Command();

program
  .name('uploadctl')
  .description('Connectivity-aware upload and analysis queue')
  .version('0.3.0');

program
  .command('enqueue')
  .argument('<files...>', 'artifact files to upload')
  .action((files: string[]) =>
    run(() => {
      const jobs = enqueue(openCliStore(), files);
      for (const job of jobs) console.log(`✅ Enqueued job ${job.id} (${job.artifactRef})`);
    })()
  );

program
  .command('run')
  .description('process the queue until interrupted')
  .option('--no-dashboard', 'do not start the web dashboard')
  .action((opts: { dashboard: boolean }) => run(() => startWorker(opts))());

program
  .command('status')
  .action(() => run(() => printStatus(openCliStore()))());

program
  .command('list')
  .option('--status <status>', JOB_STATUSES.join('|'), parseStatus)
  .option('--limit <n>', 'max rows', parsePositiveInt)
  .action((opts: { status?: JobStatus; limit?: number }) => run(() => printList(openCliStore(), opts))());

program
  .command('retry')
  .argument('[id]', 'failed job id')
  .option('--all', 'retry every failed job')
  .action((id: string | undefined, opts: { all?: boolean }) =>
    run(() => {
      const store = openCliStore();
      if (opts.all) {
        console.log(`Re-enqueued ${retryAllFailed(store)} failed job(s)`);
        return;
      }
      if (!id) throw new Error('Pass a job id or --all.');
      retryJob(store, id);
    })()
  );

program
  .command('delete')
  .argument('<id>')
  .action((id: string) =>
    run(() => {
      openCliStore().delete(id);
      console.log('Deleted job', id);
    })()
  );

program
  .command('cleanup')
  .description('delete completed jobs and their artifacts')
  .option('--days <n>', 'keep jobs newer than this', parsePositiveInt, 30)
  .action((opts: { days: number }) =>
    run(() => {
      const removed = openCliStore().cleanup(opts.days);
      console.log(`Removed ${removed} completed job(s) older than ${opts.days} day(s)`);
    })()
  );

const config = program.command('config');
config.command('get').action(() => run(() => console.log(getConfigAll(getDB())))());
config
  .command('set')
  .argument('<key>')
  .argument('<value>')
  .action((key: string, value: string) =>
    run(() => {
      setConfigKV(getDB(), key, value);
      console.log('OK');
    })()
  );
config
  .command('unset')
  .argument('<key>')
  .action((key: string) =>
    run(() => {
      console.log(unsetConfigKey(getDB(), key) ? 'OK' : 'Not set');
    })()
  );

await program.parseAsync(process.argv);
