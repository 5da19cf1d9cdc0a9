import { FfmpegAudioDecoder } from './audio';
import { CheckpointStore } from './checkpoint';
import { createDiarizationBackend } from './diarization';
import { createEmbedder, type Embedder } from './embedding';
import type { PipelineConfig } from './env';
import { setLogFormat, setLogLevel } from './log';
import { PipelineOrchestrator } from './orchestrator';
import { FfprobeMediaProbe } from './probe';
import { QueryEngine } from './query';
import { createIndexStore, type IndexStore } from './store';
import { createTranscriptionBackend } from './transcription';

export interface Pipeline {
  store: IndexStore;
  embedder: Embedder;
  orchestrator: PipelineOrchestrator;
  query: QueryEngine;
  close(): Promise<void>;
}

/** Wire the configured backends, store and checkpoints into an orchestrator and query engine. */
export function createPipeline(config: PipelineConfig): Pipeline {
  setLogLevel(config.log.level);
  setLogFormat(config.log.format);

  const store = createIndexStore(config.store, config.metric);
  const embedder = createEmbedder(config.embedding);
  const orchestrator = new PipelineOrchestrator({
    store,
    probe: new FfprobeMediaProbe(),
    decoder: new FfmpegAudioDecoder(),
    transcriber: createTranscriptionBackend(config.transcription, config.cleanup),
    diarizer: createDiarizationBackend(config.diarization),
    embedder,
    checkpoints: new CheckpointStore(config.artifactsRoot),
    chunker: config.chunker,
    metric: config.metric,
    retry: config.retry,
    backendTimeoutMs: config.backendTimeoutMs,
    ingestConcurrency: config.ingestConcurrency,
    backendConcurrency: config.backendConcurrency,
    mediaExtensions: config.mediaExtensions,
  });
  const query = new QueryEngine(store, embedder, config.metric, config.query, {
    retry: config.retry,
    timeoutMs: config.backendTimeoutMs,
  });
  return { store, embedder, orchestrator, query, close: () => store.close() };
}
