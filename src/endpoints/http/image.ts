import { HttpEndpoint, HttpHandler } from '../http-index.js';
import { buildPngResponse } from './example-content.js';

const matchPath = (path: string) => path === '/image/png';

const handle: HttpHandler = () => buildPngResponse();

export const imagePng: HttpEndpoint = {
    matchPath,
    handle
};
