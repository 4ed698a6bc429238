import { Encoding, Encodings } from './encoding.js';
import { isExcluded } from './media-type.js';
import type { CompressionRequest, CompressibleResponse } from './response.js';
import type { CompressionConfig } from './config.js';

export function acceptedEncodings(request: CompressionRequest): string[] {
    const header = request.headers['accept-encoding'];
    if (header === undefined) return [];

    return (typeof header === 'string' ? [header] : header)
        .flatMap((value) => value.split(','))
        .map((token) => token.trim())
        .filter((token) => token.length > 0);
}

export const acceptsEncoding = (request: CompressionRequest, token: string) =>
    acceptedEncodings(request).includes(token);

/**
 * Works out which encoding, if any, should be applied to this response. This
 * only decides: nothing is modified.
 *
 * Responses that are already encoded are never touched, whatever the encoding,
 * and we never stack encodings. Brotli wins over gzip when both are enabled
 * and accepted.
 */
export function decideEncoding(
    request: CompressionRequest,
    response: CompressibleResponse,
    config: CompressionConfig
): Encoding | undefined {
    if (response.hasHeader('content-encoding')) return undefined;

    if (isExcluded(response.contentType(), config.exclusions)) return undefined;

    const accepted = acceptedEncodings(request);

    if (config.encodings.has('br') && accepted.includes('br')) {
        return Encodings.Brotli;
    }

    if (config.encodings.has('gzip') && accepted.includes('gzip')) {
        return Encodings.Gzip;
    }

    return undefined;
}
