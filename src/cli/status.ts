import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import { loadPipelineConfig } from '../pipeline/env';
import { createPipeline } from '../pipeline/pipeline';
import type { MediaFilters } from '../pipeline/store';
import type { MediaStatus } from '../pipeline/types';

const STATUSES: readonly MediaStatus[] = [
  'Discovered',
  'Transcribing',
  'Diarizing',
  'Aligning',
  'Embedding',
  'Indexed',
  'Failed',
];

function isStatus(v: string): v is MediaStatus {
  return STATUSES.some((s) => s === v);
}

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option('project', { type: 'string' })
    .option('status', { type: 'array', string: true, choices: STATUSES })
    .option('json', { type: 'boolean', default: false })
    .help()
    .parse();

  const filters: MediaFilters = {};
  if (argv.project) filters.projectName = argv.project;
  if (argv.status?.length) filters.status = argv.status.map(String).filter(isStatus);

  const pipeline = createPipeline(loadPipelineConfig());
  try {
    const spec = await pipeline.store.describe();
    const items = await pipeline.store.listMediaItems(filters);
    if (argv.json) {
      console.log(JSON.stringify({ index: spec, items }, null, 2));
      return;
    }
    console.log(spec ? `Index: ${spec.model} dim=${spec.dimension} metric=${spec.metric}` : 'Index: empty');
    if (!items.length) {
      console.log('No media items.');
      return;
    }
    const counts = new Map<MediaStatus, number>();
    for (const item of items) {
      counts.set(item.status, (counts.get(item.status) ?? 0) + 1);
      const version = item.currentVersion !== undefined ? ` v${item.currentVersion}` : '';
      const checkpoint = item.checkpoint ? ` checkpoint=${item.checkpoint}` : '';
      const event = item.eventName ? ` [${item.eventName}]` : '';
      console.log(`${item.id.slice(0, 12)} ${item.status.padEnd(12)}${version}${checkpoint} ${item.path}${event}`);
      if (item.failure) {
        const retry = item.failure.retryable ? 'retryable' : 'permanent';
        console.log(`    ${item.failure.code} during ${item.failure.stage} (${retry}): ${item.failure.message}`);
      }
    }
    console.log('\n' + STATUSES.filter((s) => counts.has(s)).map((s) => `${s}=${counts.get(s)}`).join(' '));
  } finally {
    await pipeline.close();
  }
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
