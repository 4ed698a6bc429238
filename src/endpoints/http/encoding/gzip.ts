import * as zlib from 'node:zlib';

import { CompressibleResponse, ResponseBody } from '../../../compression/index.js';
import { serializeJson } from '../../../util.js';
import { HttpEndpoint, HttpHandler } from '../../http-index.js';

// Encoded once up front. This is already gzipped, so the compression hook
// must pass it through untouched, even for clients that accept gzip.
const data = zlib.gzipSync(serializeJson({
    gzipped: true
}));

const matchPath = (path: string) => path === '/encoding/gzip';

const handle: HttpHandler = () => new CompressibleResponse(200, {
    'content-type': 'application/json',
    'content-encoding': 'gzip'
}, ResponseBody.from(data));

export const gzip: HttpEndpoint = {
    matchPath,
    handle
};
