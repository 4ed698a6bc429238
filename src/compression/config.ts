import { MediaType, MediaTypeParseError, parseMediaType } from './media-type.js';

export const SUPPORTED_ENCODINGS = ['gzip', 'br'] as const;
export type SupportedEncoding = typeof SUPPORTED_ENCODINGS[number];

export const DEFAULT_EXCLUSIONS: readonly string[] = Object.freeze([
    'application/gzip',
    'application/zip',
    'image/*',
    'video/*',
    'application/wasm',
    'application/octet-stream'
]);

export const DEFAULT_ENCODINGS: readonly SupportedEncoding[] = Object.freeze(['gzip'] as const);

export interface CompressionOptions {
    /**
     * Media types that are never compressed, as `type/subtype` or `type/*`.
     * If set, this replaces the default list entirely: add back any defaults
     * you still want.
     */
    exclude?: readonly string[];

    /**
     * Which encoders are enabled. Brotli is preferred over gzip when both are
     * enabled and accepted. Defaults to gzip only.
     */
    encodings?: readonly string[];
}

export interface CompressionConfig {
    readonly exclusions: readonly MediaType[];
    readonly encodings: ReadonlySet<SupportedEncoding>;
}

export class CompressionConfigError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'CompressionConfigError';
    }
}

const isSupportedEncoding = (value: string): value is SupportedEncoding =>
    SUPPORTED_ENCODINGS.some((encoding) => encoding === value);

function parseExclusion(pattern: string): MediaType {
    try {
        return parseMediaType(pattern);
    } catch (e) {
        if (e instanceof MediaTypeParseError) {
            throw new CompressionConfigError(`Bad compression exclusion: ${e.message}`, { cause: e });
        }
        throw e;
    }
}

function parseEncodingName(name: string): SupportedEncoding {
    if (!isSupportedEncoding(name)) {
        throw new CompressionConfigError(
            `Unsupported compression encoding '${name}' (expected one of ${SUPPORTED_ENCODINGS.join(', ')})`
        );
    }
    return name;
}

export function buildCompressionConfig(options: CompressionOptions = {}): CompressionConfig {
    const exclusions = (options.exclude ?? DEFAULT_EXCLUSIONS).map(parseExclusion);
    const encodings = (options.encodings ?? DEFAULT_ENCODINGS).map(parseEncodingName);

    return Object.freeze({
        exclusions: Object.freeze(exclusions),
        encodings: new Set(encodings)
    });
}

export const DEFAULT_COMPRESSION_CONFIG = buildCompressionConfig();

const splitList = (value: string) => value
    .split(',')
    .map((item) => item.trim());

/**
 * Reads compression options from $COMPRESS_EXCLUDE and $COMPRESS_ENCODINGS.
 * Unset variables leave the defaults in place. An empty $COMPRESS_EXCLUDE
 * means 'exclude nothing'.
 */
export function loadCompressionOptions(env: NodeJS.ProcessEnv = process.env): CompressionOptions {
    const options: CompressionOptions = {};

    if (env.COMPRESS_EXCLUDE !== undefined) {
        options.exclude = env.COMPRESS_EXCLUDE.trim()
            ? splitList(env.COMPRESS_EXCLUDE)
            : [];
    }

    if (env.COMPRESS_ENCODINGS !== undefined) {
        options.encodings = splitList(env.COMPRESS_ENCODINGS);
    }

    return options;
}
