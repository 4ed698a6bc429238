import { Readable } from 'stream';
import { StatusError } from '@httptoolkit/util';

import { CompressibleResponse, ResponseBody } from '../../compression/index.js';
import { parseBoundedInt } from '../../util.js';
import { HttpEndpoint, HttpHandler } from '../http-index.js';

const MAX_LINES = 100;

const matchPath = (path: string) => path.startsWith('/stream/');

async function* generateLines(count: number) {
    for (let i = 0; i < count; i++) {
        yield `Line ${i}\n`;
    }
}

// Body is generated lazily, line by line, with no known length up front
const handle: HttpHandler = (_req, { path }) => {
    const lineCount = parseBoundedInt(path.slice('/stream/'.length), MAX_LINES);
    if (lineCount === undefined) {
        throw new StatusError(400, 'Invalid line count');
    }

    return new CompressibleResponse(200, {
        'content-type': 'text/plain'
    }, ResponseBody.fromStream(Readable.from(generateLines(lineCount))));
}

export const stream: HttpEndpoint = {
    matchPath,
    handle
};
