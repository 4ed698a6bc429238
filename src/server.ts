import * as http from 'http';
import { fileURLToPath } from 'url';

import { createHttpHandler } from './http-handler.js';
import {
    CompressionHook,
    CompressionOptions,
    loadCompressionOptions
} from './compression/index.js';

interface ServerOptions {
    compression?: CompressionOptions;
}

const createRequestHandler = async (options: ServerOptions = {}) => {
    const responseHook = new CompressionHook();

    // Throws if the compression config is invalid, so we never start up with
    // an exclusion list we don't understand.
    await responseHook.onStartup(options.compression ?? {});

    return createHttpHandler({ responseHook });
};

function createHttpServer(handler: http.RequestListener) {
    const server = http.createServer(handler);
    server.on('error', (err) => console.log('HTTP server error', err));
    return server;
}

export async function createServer(options: ServerOptions = {}) {
    const requestHandler = await createRequestHandler(options);
    return createHttpServer(requestHandler);
}

// This is not a perfect test (various odd cases) but good enough
const wasRunDirectly = fileURLToPath(import.meta.url) === process.argv[1];
if (wasRunDirectly) {
    const ports = (process.env.PORTS?.split(',') ?? ['3000'])
        .map((port) => parseInt(port, 10));

    createRequestHandler({
        compression: loadCompressionOptions(process.env)
    }).then((requestHandler) => {
        ports.forEach((port) => {
            const server = createHttpServer(requestHandler);
            server.listen(port, () => {
                console.log(`Server listening on port ${port}`);
            });
        });
    }).catch((e) => {
        console.error('Server failed to start', e);
        process.exit(1);
    });
}
