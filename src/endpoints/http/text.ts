import { CompressibleResponse, ResponseBody } from '../../compression/index.js';
import { HttpEndpoint, HttpHandler } from '../http-index.js';

const matchPath = (path: string) => path === '/text';

// Returns ?body (default 'hello world') with the content type from ?type. An
// empty ?type sends no content type at all.
const handle: HttpHandler = (_req, { query }) => {
    const body = query.get('body') ?? 'hello world';
    const contentType = query.get('type') ?? 'text/plain';

    return new CompressibleResponse(200, {
        ...(contentType ? { 'content-type': contentType } : {}),
        'content-length': Buffer.byteLength(body)
    }, ResponseBody.from(body));
}

export const text: HttpEndpoint = {
    matchPath,
    handle
};
