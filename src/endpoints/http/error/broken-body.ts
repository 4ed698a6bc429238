import { BodyChunk, CompressibleResponse, ResponseBody } from '../../../compression/index.js';
import { HttpEndpoint, HttpHandler } from '../../http-index.js';

const matchPath = (path: string) => path === '/error/broken-body';

async function* failingChunks(): AsyncGenerator<BodyChunk> {
    yield { data: Buffer.from('This body starts fine, ') };
    yield { error: new Error('Body source failed') };
}

// Headers go out fine, but the body fails partway through
const handle: HttpHandler = () => new CompressibleResponse(200, {
    'content-type': 'text/plain'
}, ResponseBody.fromChunks(failingChunks()));

export const brokenBody: HttpEndpoint = {
    matchPath,
    handle
};
