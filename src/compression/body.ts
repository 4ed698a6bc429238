import { Readable } from 'stream';

/**
 * One unit of a lazy body: either some bytes, or the failure that ended it.
 * A failure is always the last unit of its sequence.
 */
export type BodyChunk =
    | { data: Buffer, error?: undefined }
    | { error: Error, data?: undefined };

export class BodyConsumedError extends Error {
    constructor() {
        super('Response body has already been consumed');
        this.name = 'BodyConsumedError';
    }
}

export const toError = (e: unknown) =>
    e instanceof Error ? e : new Error(String(e));

async function* readableChunks(stream: Readable): AsyncGenerator<BodyChunk> {
    try {
        for await (const chunk of stream) {
            yield { data: Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk) };
        }
    } catch (e) {
        yield { error: toError(e) };
    }
}

async function* bufferChunks(data: Buffer): AsyncGenerator<BodyChunk> {
    if (data.byteLength > 0) yield { data };
}

/**
 * A body that produces its bytes on demand. It can only be read once: after
 * that, whoever read it owns the data.
 */
export class ResponseBody {

    private source: AsyncIterable<BodyChunk> | undefined;

    private constructor(source: AsyncIterable<BodyChunk>) {
        this.source = source;
    }

    static from(value: Uint8Array | string) {
        const data = typeof value === 'string'
            ? Buffer.from(value, 'utf8')
            : Buffer.from(value);
        return new ResponseBody(bufferChunks(data));
    }

    static fromStream(stream: Readable) {
        return new ResponseBody(readableChunks(stream));
    }

    static fromChunks(chunks: AsyncIterable<BodyChunk>) {
        return new ResponseBody(chunks);
    }

    get consumed() {
        return this.source === undefined;
    }

    chunks(): AsyncIterable<BodyChunk> {
        const source = this.source;
        if (!source) throw new BodyConsumedError();
        this.source = undefined;
        return source;
    }
}

/**
 * Reads a body to completion, rejecting with the first failure it contains.
 */
export async function collectBody(body: ResponseBody): Promise<Buffer> {
    const buffers: Buffer[] = [];
    for await (const chunk of body.chunks()) {
        if (chunk.error !== undefined) throw chunk.error;
        buffers.push(chunk.data);
    }
    return Buffer.concat(buffers);
}

async function* dataOnly(body: ResponseBody): AsyncGenerator<Buffer> {
    for await (const chunk of body.chunks()) {
        if (chunk.error !== undefined) throw chunk.error;
        yield chunk.data;
    }
}

/**
 * A stream view of the body, for writing to a socket. A failure unit destroys
 * the stream with that error.
 */
export const toReadable = (body: ResponseBody) =>
    Readable.from(dataOnly(body), { objectMode: false });
