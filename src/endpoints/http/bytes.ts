import { StatusError } from '@httptoolkit/util';

import { CompressibleResponse, ResponseBody } from '../../compression/index.js';
import { parseBoundedInt } from '../../util.js';
import { HttpEndpoint, HttpHandler } from '../http-index.js';

const MAX_BYTES = 100 * 1024;

const matchPath = (path: string) => path.startsWith('/bytes/');

const handle: HttpHandler = (_req, { path }) => {
    const byteCount = parseBoundedInt(path.slice('/bytes/'.length), MAX_BYTES);
    if (byteCount === undefined) {
        throw new StatusError(400, 'Invalid byte count');
    }

    // Deterministic, so that tests can check the exact content
    const data = Buffer.alloc(byteCount);
    for (let i = 0; i < byteCount; i++) data[i] = i % 256;

    return new CompressibleResponse(200, {
        'content-type': 'application/octet-stream',
        'content-length': byteCount
    }, ResponseBody.from(data));
}

export const bytes: HttpEndpoint = {
    matchPath,
    handle
};
