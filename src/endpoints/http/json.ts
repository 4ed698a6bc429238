import { CompressibleResponse, ResponseBody } from '../../compression/index.js';
import { serializeJson } from '../../util.js';
import { HttpEndpoint, HttpHandler } from '../http-index.js';
import { EXAMPLE_DOCUMENT } from './example-content.js';

const matchPath = (path: string) => path === '/json';

const handle: HttpHandler = () => new CompressibleResponse(200, {
    'content-type': 'application/json'
}, ResponseBody.from(serializeJson(EXAMPLE_DOCUMENT)));

export const json: HttpEndpoint = {
    matchPath,
    handle
};
