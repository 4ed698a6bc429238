import { MaybePromise } from '@httptoolkit/util';
import * as http from 'http';

import { CompressibleResponse } from '../compression/index.js';

export type HttpRequest = http.IncomingMessage;

export type HttpHandler = (
    req: HttpRequest,
    options: {
        path: string;
        query: URLSearchParams;
    }
) => MaybePromise<CompressibleResponse>;

export interface HttpEndpoint {
    matchPath: (path: string) => boolean;
    handle: HttpHandler;
}

export * from './http/html.js';
export * from './http/text.js';
export * from './http/json.js';
export * from './http/stream.js';
export * from './http/image.js';
export * from './http/bytes.js';
export * from './http/compressed.js';
export * from './http/encoding/identity.js';
export * from './http/encoding/gzip.js';
export * from './http/error/broken-body.js';
