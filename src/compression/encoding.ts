export type StandardEncodingKind =
    | 'chunked'
    | 'brotli'
    | 'gzip'
    | 'deflate'
    | 'compress'
    | 'identity'
    | 'trailers';

/**
 * An HTTP content/transfer coding. Anything outside the standard set is kept
 * as an extension, carrying its token exactly as it was seen.
 */
export type Encoding =
    | { readonly kind: StandardEncodingKind }
    | { readonly kind: 'extension', readonly token: string };

const STANDARD_TOKENS: Record<StandardEncodingKind, string> = {
    chunked: 'chunked',
    brotli: 'br',
    gzip: 'gzip',
    deflate: 'deflate',
    compress: 'compress',
    identity: 'identity',
    trailers: 'trailers'
};

export const Encodings = {
    Chunked: { kind: 'chunked' },
    Brotli: { kind: 'brotli' },
    Gzip: { kind: 'gzip' },
    Deflate: { kind: 'deflate' },
    Compress: { kind: 'compress' },
    Identity: { kind: 'identity' },
    Trailers: { kind: 'trailers' }
} as const satisfies Record<string, Encoding>;

export const encodingExt = (token: string): Encoding =>
    ({ kind: 'extension', token });

// Case-sensitive: 'GZIP' is an extension token, not gzip.
export function parseEncoding(token: string): Encoding {
    switch (token) {
        case 'chunked': return Encodings.Chunked;
        case 'br': return Encodings.Brotli;
        case 'gzip': return Encodings.Gzip;
        case 'deflate': return Encodings.Deflate;
        case 'compress': return Encodings.Compress;
        case 'identity': return Encodings.Identity;
        case 'trailers': return Encodings.Trailers;
        default: return encodingExt(token);
    }
}

export function formatEncoding(encoding: Encoding): string {
    return encoding.kind === 'extension'
        ? encoding.token
        : STANDARD_TOKENS[encoding.kind];
}

export const encodingsEqual = (a: Encoding, b: Encoding) =>
    a.kind === b.kind && formatEncoding(a) === formatEncoding(b);
