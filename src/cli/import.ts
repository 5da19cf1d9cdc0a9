import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import path from 'path';
import { ENV, loadPipelineConfig } from '../pipeline/env';
import { error, info, setLogFile, warn } from '../pipeline/log';
import { createPipeline } from '../pipeline/pipeline';
import { TRANSCRIPT_EXTENSIONS } from '../pipeline/transcript_import';

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .usage('$0 --path <dir|file> [options]\n\nRegister existing text transcripts ("**SPEAKER** : text" paragraphs) without transcribing.')
    .option('path', { type: 'string', demandOption: true, describe: 'Transcript folder or single file' })
    .option('project', { type: 'string', default: ENV.defaultProject })
    .option('event', { alias: 'e', type: 'string', describe: 'Event name applied to every transcript' })
    .option('event-date', { type: 'string', describe: 'YYYY-MM-DD applied to every transcript' })
    .option('language', { type: 'string', default: ENV.defaultLanguage })
    .option('ext', { type: 'array', string: true, default: TRANSCRIPT_EXTENSIONS, describe: 'File extensions to register' })
    .option('words-per-second', { type: 'number', default: 2.5, describe: 'Speaking rate used to estimate timestamps' })
    .option('force', { type: 'boolean', default: ENV.force, describe: 'Re-register transcripts that are already indexed' })
    .help()
    .parse();

  const config = loadPipelineConfig();
  const runLog = path.join(config.artifactsRoot, 'logs', `import-${Date.now()}.log`);
  setLogFile(runLog);
  const pipeline = createPipeline(config);

  const controller = new AbortController();
  const onSignal = () => {
    warn('import.interrupt');
    controller.abort();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    info('import.start', { path: argv.path, project: argv.project, log: runLog });
    const summary = await pipeline.orchestrator.importTranscripts(argv.path, argv.project, {
      eventName: argv.event,
      eventDate: argv['event-date'],
      language: argv.language,
      extensions: argv.ext.map((e) => e.toLowerCase().replace(/^\./, '')),
      wordsPerSecond: argv['words-per-second'],
      force: argv.force,
      signal: controller.signal,
    });

    console.log(`\n${summary.root} (${summary.projectName})`);
    for (const item of summary.items) {
      const detail =
        item.outcome === 'indexed'
          ? `v${item.version} ${item.chunks} chunks`
          : item.error
            ? `${item.error.code}: ${item.error.message}`
            : item.reason ?? '';
      console.log(` - [${item.outcome}] ${item.path} ${detail}`);
    }
    console.log(`\nindexed=${summary.indexed} skipped=${summary.skipped} failed=${summary.failed}`);
    if (summary.failed > 0 || summary.cancelled > 0) process.exitCode = 2;
  } finally {
    await pipeline.close();
    setLogFile(null);
  }
}

main().catch((e) => {
  error('import.fail', { error: e instanceof Error ? e.message : String(e) });
  console.error(e);
  process.exit(1);
});
