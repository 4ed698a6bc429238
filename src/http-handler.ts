import * as http from 'http';
import { pipeline } from 'stream/promises';
import { StatusError } from '@httptoolkit/util';

import {
    CompressibleResponse,
    ResponseBody,
    ResponseHook,
    toReadable
} from './compression/index.js';
import { httpEndpoints } from './endpoints/endpoint-index.js';

const textResponse = (statusCode: number, message: string) =>
    new CompressibleResponse(statusCode, {
        'content-type': 'text/plain'
    }, ResponseBody.from(message));

export function createHttpHandler(options: {
    responseHook: ResponseHook
}) {
    async function buildResponse(req: http.IncomingMessage, url: URL): Promise<CompressibleResponse> {
        const path = url.pathname;

        const matchingEndpoint = httpEndpoints.find((endpoint) =>
            endpoint.matchPath(path)
        );

        if (!matchingEndpoint) {
            console.log(`Request to ${path} matched no endpoints`);
            return textResponse(404, `No handler for ${req.url}`);
        }

        console.log(`Request to ${path} matched endpoint ${matchingEndpoint.name}`);

        try {
            return await matchingEndpoint.handle(req, { path, query: url.searchParams });
        } catch (e) {
            if (e instanceof StatusError) {
                console.log(`Request to ${path} failed: ${e.message}`);
                return textResponse(e.statusCode, e.message);
            }
            throw e;
        }
    }

    async function handleRequest(req: http.IncomingMessage, res: http.ServerResponse) {
        const url = new URL(req.url ?? '/', `http://${req.headers.host}`);
        const response = await buildResponse(req, url);

        // Every response goes through the hook, which may swap out the body
        await options.responseHook.onResponse(req, response);

        res.writeHead(response.statusCode, response.getHeaders());

        const body = response.takeBody();
        if (!body || req.method === 'HEAD') {
            res.end();
            return;
        }

        await pipeline(toReadable(body), res);
    }

    return async (req: http.IncomingMessage, res: http.ServerResponse) => {
        try {
            console.log(`Handling request to ${req.url}`);
            await handleRequest(req, res);
        } catch (e) {
            console.error(e);

            if (res.closed) return;
            else if (res.headersSent) {
                // Too late to send an error, all we can do is cut the response off
                res.destroy();
            } else {
                res.writeHead(500);
                res.end('HTTP handler failed');
            }
        }
    };
}
