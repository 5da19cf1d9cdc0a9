import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import fs from 'fs-extra';
import path from 'path';
import { execa } from 'execa';
import { Client } from 'pg';
import { ENV, loadPipelineConfig, redactUrl } from '../pipeline/env';
import { createPipeline } from '../pipeline/pipeline';

/*
 * reset.ts - destructive cleanup utility.
 * By default does NOTHING unless flags provided.
 * Operations:
 *   --media <id> : remove one media item, its versions and checkpoints
 *   --artifacts  : delete checkpoints and run logs
 *   --index      : delete the file index (DISABLE_DB deployments)
 *   --db         : drop all index tables and _migrations
 *   --images     : remove the local whisperx image (WHISPERX_IMAGE)
 *   --all        : artifacts, index, db and images
 * Safety:
 *   Requires --yes to perform deletions. Otherwise prints plan only.
 */
const TABLES = ['embeddings', 'chunks', 'segments', 'ingestion_versions', 'media_items', 'index_meta', '_migrations'];

async function dropDb(databaseUrl: string) {
  const client = new Client({ connectionString: databaseUrl });
  await client.connect();
  try {
    await client.query('BEGIN');
    for (const t of TABLES) await client.query(`DROP TABLE IF EXISTS ${t} CASCADE`);
    await client.query('COMMIT');
  } catch (e) {
    await client.query('ROLLBACK');
    throw e;
  } finally {
    await client.end();
  }
}

async function removeImage(imageTag: string) {
  const present = await execa(ENV.dockerBin, ['image', 'inspect', imageTag], { reject: false });
  if (present.exitCode !== 0) return;
  await execa(ENV.dockerBin, ['rmi', '-f', imageTag]);
}

async function removeMedia(mediaId: string) {
  const pipeline = createPipeline(loadPipelineConfig());
  try {
    const item = await pipeline.store.getMediaItem(mediaId);
    if (!item) {
      console.log(`No media item ${mediaId} in the index.`);
    } else {
      await pipeline.store.deleteMediaItem(mediaId);
      console.log(`Removed ${mediaId} (${item.path}).`);
    }
  } finally {
    await pipeline.close();
  }
  await fs.remove(path.join(ENV.artifactsRoot, mediaId));
}

async function main() {
  const argv = await yargs(hideBin(process.argv))
    .option('media', { type: 'string', describe: 'Media id to remove' })
    .option('artifacts', { type: 'boolean', default: false })
    .option('index', { type: 'boolean', default: false })
    .option('db', { type: 'boolean', default: false })
    .option('images', { type: 'boolean', default: false })
    .option('all', { type: 'boolean', default: false })
    .option('yes', { type: 'boolean', default: false, describe: 'Confirm destructive actions' })
    .help()
    .parse();

  const ops = {
    artifacts: argv.all || argv.artifacts,
    index: argv.all || argv.index,
    db: argv.all || argv.db,
    images: argv.all || argv.images,
  };

  const plan: string[] = [];
  if (argv.media) plan.push(`Remove media item ${argv.media} with its versions and checkpoints`);
  if (ops.artifacts) plan.push(`Delete artifacts dir: ${path.resolve(ENV.artifactsRoot)}`);
  if (ops.index) plan.push(`Delete file index: ${path.resolve(ENV.indexDir)}`);
  if (ops.db) plan.push(`Drop DB tables on ${redactUrl(ENV.databaseUrl)}: ${TABLES.join(', ')}`);
  if (ops.images) plan.push(`Remove docker image: ${ENV.whisperxImage || '(none set)'}`);

  if (!plan.length) {
    console.log('Nothing selected. Use --all or specific flags (see --help).');
    return;
  }
  console.log('Reset plan:');
  for (const p of plan) console.log(' -', p);

  if (!argv.yes) {
    console.log('\nDry run only. Re-run with --yes to execute.');
    return;
  }

  if (argv.media) await removeMedia(argv.media);
  if (ops.artifacts) {
    await fs.remove(ENV.artifactsRoot);
    await fs.ensureDir(ENV.artifactsRoot);
    console.log('Artifacts cleared.');
  }
  if (ops.index) {
    await fs.remove(ENV.indexDir);
    console.log('File index removed.');
  }
  if (ops.db) {
    try {
      await dropDb(ENV.databaseUrl);
      console.log('Database tables dropped.');
    } catch (e) {
      console.error('DB drop failed:', e);
      process.exitCode = 1;
    }
  }
  if (ops.images && ENV.whisperxImage) {
    try {
      await removeImage(ENV.whisperxImage);
      console.log('Docker image removed.');
    } catch (e) {
      console.error('Image removal failed:', e);
      process.exitCode = 1;
    }
  }
  console.log('Reset complete.');
}

main().catch((e) => {
  console.error(e);
  process.exit(1);
});
