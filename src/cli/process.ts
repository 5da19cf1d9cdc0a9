import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import path from 'path';
import { ENV, loadPipelineConfig } from '../pipeline/env';
import { error, info, setLogFile, warn } from '../pipeline/log';
import { createPipeline } from '../pipeline/pipeline';

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .usage('$0 --path <dir|file> [options]')
    .option('path', { type: 'string', demandOption: true, describe: 'Media folder or single file' })
    .option('project', { type: 'string', default: ENV.defaultProject })
    .option('language', { type: 'string', default: ENV.defaultLanguage, describe: 'Language hint; empty for auto-detect' })
    .option('diarize', { type: 'boolean', default: ENV.diarizationBackend !== 'none' })
    .option('event', { alias: 'e', type: 'string', describe: 'Event name applied to every item' })
    .option('event-date', { type: 'string', describe: 'YYYY-MM-DD applied to every item' })
    .option('force', { type: 'boolean', default: ENV.force, describe: 'Reprocess indexed and permanently failed items' })
    .option('concurrency', { type: 'number', describe: 'Items in flight (default INGEST_CONCURRENCY)' })
    .help()
    .parse();

  const config = loadPipelineConfig();
  const runLog = path.join(config.artifactsRoot, 'logs', `run-${Date.now()}.log`);
  setLogFile(runLog);
  const pipeline = createPipeline(config);

  const controller = new AbortController();
  const onSignal = () => {
    if (controller.signal.aborted) {
      warn('process.force_exit');
      process.exit(130);
    }
    warn('process.interrupt', { hint: 'finishing in-flight work; press Ctrl-C again to exit immediately' });
    controller.abort();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    info('process.start', { path: argv.path, project: argv.project, log: runLog });
    const summary = await pipeline.orchestrator.processFolder(
      argv.path,
      argv.project,
      argv.language,
      argv.diarize,
      {
        eventName: argv.event,
        eventDate: argv['event-date'],
        force: argv.force,
        concurrency: argv.concurrency,
        signal: controller.signal,
      }
    );

    console.log(`\n${summary.root} (${summary.projectName})`);
    for (const item of summary.items) {
      const detail =
        item.outcome === 'indexed'
          ? `v${item.version} ${item.chunks} chunks${item.resumedFrom ? `, resumed at ${item.resumedFrom}` : ''}`
          : item.error
            ? `${item.error.code}: ${item.error.message}`
            : item.reason ?? item.status ?? '';
      console.log(` - [${item.outcome}] ${item.path} ${detail}`);
    }
    console.log(
      `\nindexed=${summary.indexed} skipped=${summary.skipped} failed=${summary.failed} ` +
        `cancelled=${summary.cancelled} in ${(summary.durationMs / 1000).toFixed(1)}s`
    );
    console.log('Log:', path.resolve(runLog));
    if (summary.failed > 0 || summary.cancelled > 0) process.exitCode = 2;
  } finally {
    await pipeline.close();
    setLogFile(null);
  }
}

main().catch((e) => {
  error('process.fail', { error: e instanceof Error ? e.message : String(e) });
  console.error(e);
  process.exit(1);
});
