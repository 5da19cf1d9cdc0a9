import OpenAI from 'openai';
import {
    BackendTimeoutError,
    BackendUnavailableError,
    CancelledError,
    ConfigurationError,
    UnsupportedFormatError,
    errorMessage,
    type BackendName,
} from './errors';

export function createOpenAIClient(apiKey: string): OpenAI {
    if (!apiKey) throw new ConfigurationError('Missing OpenAI key (set OPENAI_API_KEY)', 'MISSING_API_KEY');
    // Retries are handled by the pipeline's own backoff
    return new OpenAI({ apiKey, maxRetries: 0 });
}

/**
 * Translate SDK errors into the pipeline taxonomy. A 400 on an input file means the
 * provider cannot decode it; other 4xx mean the request itself is misconfigured.
 */
export function mapOpenAIError(e: unknown, backend: BackendName, inputPath?: string): Error {
    if (e instanceof OpenAI.APIUserAbortError) return new CancelledError();
    if (e instanceof OpenAI.APIConnectionTimeoutError) {
        return new BackendTimeoutError(`OpenAI ${backend} request timed out`, backend, 0);
    }
    if (e instanceof OpenAI.APIConnectionError) {
        return new BackendUnavailableError(`OpenAI ${backend} connection failed: ${e.message}`, backend);
    }
    if (e instanceof OpenAI.APIError) {
        const status = e.status ?? 0;
        if (status === 429 || status >= 500 || status === 0) {
            return new BackendUnavailableError(`OpenAI ${backend} unavailable (status ${status}): ${e.message}`, backend, { status });
        }
        if (status === 401 || status === 403 || status === 404) {
            return new ConfigurationError(`OpenAI rejected the ${backend} request (status ${status}): ${e.message}`, 'PROVIDER_CONFIG', { status });
        }
        if (inputPath && (status === 400 || status === 413 || status === 415)) {
            return new UnsupportedFormatError(`OpenAI could not process ${inputPath}: ${e.message}`, inputPath, backend);
        }
        return new ConfigurationError(`OpenAI ${backend} request invalid (status ${status}): ${e.message}`, 'PROVIDER_CONFIG', { status });
    }
    return new BackendUnavailableError(`OpenAI ${backend} call failed: ${errorMessage(e)}`, backend);
}
