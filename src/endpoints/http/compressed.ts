import { compressResponse } from '../../compression/index.js';
import { HttpEndpoint, HttpHandler } from '../http-index.js';
import { buildPngResponse } from './example-content.js';

const matchPath = (path: string) => path === '/compressed/image/png';

// Compressed regardless of the exclusion list, since this route opts in itself
const handle: HttpHandler = (req) => {
    const response = buildPngResponse();
    compressResponse(req, response);
    return response;
}

export const compressedImagePng: HttpEndpoint = {
    matchPath,
    handle
};
