import type * as http from 'http';

export interface MediaType {
    readonly top: string;
    readonly sub: string;
}

export class MediaTypeParseError extends Error {
    constructor(public readonly value: string, reason: string) {
        super(`Invalid media type '${value}': ${reason}`);
        this.name = 'MediaTypeParseError';
    }
}

// RFC 9110 token characters
const TOKEN_PATTERN = /^[!#$%&'*+.^_`|~0-9a-z-]+$/;

/**
 * Parses a configured media type pattern, either `type/subtype` or `type/*`.
 * Parameters are dropped, and both components are lowercased. Throws for
 * anything else: these patterns come from configuration, and we'd rather
 * refuse to start than guess what was meant.
 */
export function parseMediaType(value: string): MediaType {
    const essence = value.split(';')[0].trim().toLowerCase();
    const parts = essence.split('/');

    if (parts.length !== 2) {
        throw new MediaTypeParseError(value, 'expected exactly one "/"');
    }

    const [top, sub] = parts;
    if (!top || !sub) {
        throw new MediaTypeParseError(value, 'type and subtype must both be set');
    }

    if (top === '*') {
        throw new MediaTypeParseError(value, 'top-level type cannot be a wildcard');
    }

    if (!TOKEN_PATTERN.test(top) || (sub !== '*' && !TOKEN_PATTERN.test(sub))) {
        throw new MediaTypeParseError(value, 'contains invalid characters');
    }

    return Object.freeze({ top, sub });
}

/**
 * Reads a response's Content-Type header. Missing or unparseable headers give
 * undefined, which the matcher treats as 'never excluded'.
 */
export function parseContentType(header: http.OutgoingHttpHeader | undefined): MediaType | undefined {
    const value = typeof header === 'object' ? header[0] : header?.toString();
    if (value === undefined) return undefined;

    try {
        return parseMediaType(value);
    } catch (e) {
        if (e instanceof MediaTypeParseError) return undefined;
        throw e;
    }
}

export const formatMediaType = (mediaType: MediaType) =>
    `${mediaType.top}/${mediaType.sub}`;

export function matches(candidate: MediaType, exclusion: MediaType): boolean {
    if (exclusion.sub === '*') {
        return exclusion.top === candidate.top;
    }

    return exclusion.top === candidate.top && exclusion.sub === candidate.sub;
}

export function isExcluded(
    contentType: MediaType | undefined,
    exclusions: readonly MediaType[]
): boolean {
    if (!contentType) return false;
    return exclusions.some((exclusion) => matches(contentType, exclusion));
}
