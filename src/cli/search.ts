import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import path from 'path';
import { loadPipelineConfig } from '../pipeline/env';
import { chunkBody } from '../pipeline/chunk';
import { createPipeline } from '../pipeline/pipeline';
import type { SearchFilters } from '../pipeline/types';

function clock(sec: number): string {
  const h = Math.floor(sec / 3600);
  const m = Math.floor((sec % 3600) / 60);
  const s = Math.floor(sec % 60);
  const mm = String(m).padStart(2, '0');
  const ss = String(s).padStart(2, '0');
  return h > 0 ? `${h}:${mm}:${ss}` : `${mm}:${ss}`;
}

async function main() {
  const config = loadPipelineConfig();
  const argv = await yargs(hideBin(process.argv))
    .option('query', { alias: 'q', type: 'string', demandOption: true })
    .option('k', { type: 'number', default: config.query.k })
    .option('project', { type: 'string' })
    .option('from', { type: 'string', describe: 'Event date lower bound, YYYY-MM-DD' })
    .option('to', { type: 'string', describe: 'Event date upper bound, YYYY-MM-DD' })
    .option('media', { type: 'array', string: true, describe: 'Restrict to media ids' })
    .option('json', { type: 'boolean', default: false })
    .help()
    .parse();

  const filters: SearchFilters = {};
  if (argv.project) filters.projectName = argv.project;
  if (argv.from) filters.dateFrom = argv.from;
  if (argv.to) filters.dateTo = argv.to;
  if (argv.media?.length) filters.mediaIds = argv.media.map(String);

  const pipeline = createPipeline(config);
  try {
    const results = await pipeline.query.search(argv.query, filters, argv.k);
    if (argv.json) {
      console.log(JSON.stringify(results, null, 2));
      return;
    }
    if (!results.length) {
      console.log('No matches.');
      return;
    }
    results.forEach((r, i) => {
      const speakers = r.chunk.speakers.length ? ` [${r.chunk.speakers.join(', ')}]` : '';
      const date = r.media.eventDate ? ` ${r.media.eventDate}` : '';
      const event = r.media.eventName ? ` "${r.media.eventName}"` : '';
      console.log(
        `${i + 1}. ${r.score.toFixed(3)} ${path.basename(r.media.path)}${event}${date} ` +
          `${clock(r.chunk.startSec)}-${clock(r.chunk.endSec)}${speakers}`
      );
      console.log(`   ${chunkBody(r.chunk)}`);
    });
  } finally {
    await pipeline.close();
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
