import ky, { TimeoutError, type KyInstance, type Options as KyOptions } from 'ky';
import {
    BackendTimeoutError,
    BackendUnavailableError,
    CancelledError,
    ConfigurationError,
    UnsupportedFormatError,
    errorMessage,
    type BackendName,
} from './errors';

export interface HttpClientOptions {
    baseUrl: string;
    token?: string;
    timeoutMs?: number;
    /** Replaces the global fetch (tests) */
    fetch?: typeof fetch;
}

export function createHttpClient(options: HttpClientOptions): KyInstance {
    const kyOptions: KyOptions = {
        prefixUrl: options.baseUrl,
        // 0 disables ky's own timeout; the pipeline watchdog applies instead
        timeout: options.timeoutMs && options.timeoutMs > 0 ? options.timeoutMs : false,
        retry: 0, // retries are handled by withRetry
        throwHttpErrors: false,
    };
    if (options.token) {
        kyOptions.headers = { Authorization: `Bearer ${options.token}` };
    }
    if (options.fetch) kyOptions.fetch = options.fetch;
    return ky.create(kyOptions);
}

function isAbort(e: unknown): boolean {
    return e instanceof Error && e.name === 'AbortError';
}

async function readBody(response: Response): Promise<string> {
    try {
        return (await response.text()).slice(0, 400);
    } catch {
        return '';
    }
}

/**
 * Issue a request and decode the JSON body, mapping transport and status failures
 * to the pipeline error taxonomy. inputPath marks requests that upload a media file,
 * where a 400/413/415 means the provider cannot process that file.
 */
export async function requestJson(
    client: KyInstance,
    url: string,
    options: KyOptions,
    backend: BackendName,
    inputPath?: string
): Promise<unknown> {
    let response: Response;
    try {
        response = await client(url, options);
    } catch (e) {
        if (e instanceof TimeoutError) {
            throw new BackendTimeoutError(`${backend} request timed out: ${e.message}`, backend, 0);
        }
        if (isAbort(e) || options.signal?.aborted) throw new CancelledError();
        throw new BackendUnavailableError(`${backend} request failed: ${errorMessage(e)}`, backend);
    }

    if (!response.ok) {
        const status = response.status;
        const body = await readBody(response);
        if (status === 429 || status >= 500) {
            throw new BackendUnavailableError(`${backend} unavailable (status ${status}): ${body}`, backend, { status });
        }
        if (inputPath && (status === 400 || status === 413 || status === 415 || status === 422)) {
            throw new UnsupportedFormatError(`${backend} rejected ${inputPath} (status ${status}): ${body}`, inputPath, backend);
        }
        throw new ConfigurationError(`${backend} request rejected (status ${status}): ${body}`, 'PROVIDER_CONFIG', {
            status,
            backend,
        });
    }

    try {
        return await response.json();
    } catch (e) {
        throw new BackendUnavailableError(`${backend} returned a malformed body: ${errorMessage(e)}`, backend);
    }
}
