import { CompressibleResponse, ResponseBody } from '../../compression/index.js';
import { HttpEndpoint, HttpHandler } from '../http-index.js';
import { HTML_PAGE } from './example-content.js';

const matchPath = (path: string) => path === '/html';

const handle: HttpHandler = () => new CompressibleResponse(200, {
    'content-type': 'text/html; charset=utf-8',
    'content-length': Buffer.byteLength(HTML_PAGE)
}, ResponseBody.from(HTML_PAGE));

export const html: HttpEndpoint = {
    matchPath,
    handle
};
