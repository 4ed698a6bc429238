import type * as http from 'http';

import { ResponseBody } from './body.js';
import { MediaType, parseContentType } from './media-type.js';

// Anything with Node-style request headers, including http.IncomingMessage
export interface CompressionRequest {
    headers: Readonly<Record<string, string | string[] | undefined>>;
}

export type HeaderValue = http.OutgoingHttpHeader;

/**
 * An outgoing response that hasn't been written yet. Header names are
 * case-insensitive, and the body slot has a single owner at any time.
 */
export class CompressibleResponse {

    private readonly headers = new Map<string, HeaderValue>();
    private body: ResponseBody | undefined;

    constructor(
        public statusCode: number = 200,
        headers: http.OutgoingHttpHeaders = {},
        body?: ResponseBody
    ) {
        for (const [name, value] of Object.entries(headers)) {
            if (value !== undefined) this.setHeader(name, value);
        }
        this.body = body;
    }

    getHeader(name: string): HeaderValue | undefined {
        return this.headers.get(name.toLowerCase());
    }

    hasHeader(name: string) {
        return this.headers.has(name.toLowerCase());
    }

    setHeader(name: string, value: HeaderValue) {
        this.headers.set(name.toLowerCase(), value);
    }

    removeHeader(name: string) {
        this.headers.delete(name.toLowerCase());
    }

    getHeaders(): http.OutgoingHttpHeaders {
        return Object.fromEntries(this.headers);
    }

    contentType(): MediaType | undefined {
        return parseContentType(this.getHeader('content-type'));
    }

    get hasBody() {
        return this.body !== undefined;
    }

    /**
     * Removes the body from the response, handing it to the caller.
     */
    takeBody(): ResponseBody | undefined {
        const body = this.body;
        this.body = undefined;
        return body;
    }

    setBody(body: ResponseBody) {
        this.body = body;
    }
}
