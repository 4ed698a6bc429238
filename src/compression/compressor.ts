import * as zlib from 'node:zlib';
import { promisify } from 'node:util';

import { BodyChunk, ResponseBody, collectBody, toError } from './body.js';
import { Encoding, StandardEncodingKind, formatEncoding } from './encoding.js';
import { MediaType } from './media-type.js';
import { CompressibleResponse } from './response.js';

const gzipAsync = promisify(zlib.gzip);
const brotliAsync = promisify(zlib.brotliCompress);

type Compressor = (data: Buffer, contentType: MediaType | undefined) => Promise<Buffer>;

// Fast, low-ratio preset
const BROTLI_QUALITY = 2;

function brotliMode(contentType: MediaType | undefined) {
    switch (contentType?.top) {
        case 'text': return zlib.constants.BROTLI_MODE_TEXT;
        case 'font': return zlib.constants.BROTLI_MODE_FONT;
        default: return zlib.constants.BROTLI_MODE_GENERIC;
    }
}

const compressors: Partial<Record<StandardEncodingKind, Compressor>> = {
    gzip: (data) => gzipAsync(data, {
        level: zlib.constants.Z_DEFAULT_COMPRESSION
    }),
    brotli: (data, contentType) => brotliAsync(data, {
        params: {
            [zlib.constants.BROTLI_PARAM_QUALITY]: BROTLI_QUALITY,
            [zlib.constants.BROTLI_PARAM_MODE]: brotliMode(contentType),
            [zlib.constants.BROTLI_PARAM_SIZE_HINT]: data.byteLength
        }
    })
};

export const canCompressWith = (encoding: Encoding) =>
    getCompressor(encoding) !== undefined;

function getCompressor(encoding: Encoding): Compressor | undefined {
    if (encoding.kind === 'extension') return undefined;
    return compressors[encoding.kind];
}

/**
 * Nothing happens until the first chunk is requested. Then the whole plain
 * body is read, compressed in one pass, and emitted as a single chunk. Any
 * failure along the way becomes the one and only chunk instead.
 */
async function* compressedChunks(
    plain: ResponseBody,
    compressor: Compressor,
    contentType: MediaType | undefined,
    encodingName: string
): AsyncGenerator<BodyChunk> {
    let compressed: Buffer;
    try {
        const data = await collectBody(plain);
        compressed = await compressor(data, contentType);
    } catch (e) {
        console.error(`Error compressing response with ${encodingName}:`, e);
        yield { error: toError(e) };
        return;
    }

    yield { data: compressed };
}

/**
 * Replaces the response's body with a compressed version, and marks it with
 * the matching Content-Encoding. Returns false (and changes nothing) if there's
 * no body, or if we have no encoder for this encoding.
 */
export function applyEncoding(response: CompressibleResponse, encoding: Encoding): boolean {
    const compressor = getCompressor(encoding);
    if (!compressor) return false;

    const plain = response.takeBody();
    if (!plain) return false;

    const encodingName = formatEncoding(encoding);

    response.setBody(ResponseBody.fromChunks(
        compressedChunks(plain, compressor, response.contentType(), encodingName)
    ));
    response.setHeader('content-encoding', encodingName);
    response.removeHeader('content-length'); // No longer accurate

    return true;
}
