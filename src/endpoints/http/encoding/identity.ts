import { CompressibleResponse, ResponseBody } from '../../../compression/index.js';
import { serializeJson } from '../../../util.js';
import { HttpEndpoint, HttpHandler } from '../../http-index.js';

// Explicitly unencoded. Any existing content-encoding, even identity, means
// the response is never compressed further.
const data = serializeJson({
    identity: true
});

const matchPath = (path: string) => path === '/encoding/identity';

const handle: HttpHandler = () => new CompressibleResponse(200, {
    'content-type': 'application/json',
    'content-encoding': 'identity'
}, ResponseBody.from(data));

export const identity: HttpEndpoint = {
    matchPath,
    handle
};
