import { Encoding } from './encoding.js';
import { applyEncoding } from './compressor.js';
import { CompressionConfig, DEFAULT_COMPRESSION_CONFIG } from './config.js';
import { decideEncoding } from './negotiation.js';
import type { CompressionRequest, CompressibleResponse } from './response.js';

/**
 * Runs the whole pipeline for a single response: decide, then compress. Returns
 * the encoding that was applied, if any.
 *
 * Without an explicit config, nothing is excluded: the response is compressed
 * whatever its content type, so long as the client accepts it and it isn't
 * already encoded. This is useful for individual routes that know their
 * content compresses well.
 */
export function compressResponse(
    request: CompressionRequest,
    response: CompressibleResponse,
    config: CompressionConfig = { ...DEFAULT_COMPRESSION_CONFIG, exclusions: [] }
): Encoding | undefined {
    const encoding = decideEncoding(request, response, config);
    if (!encoding) return undefined;

    return applyEncoding(response, encoding)
        ? encoding
        : undefined;
}
