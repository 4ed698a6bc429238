import * as http from 'http';
import * as net from 'net';
import * as streamConsumers from 'stream/consumers';
import { expect } from 'chai';

export async function expectRejection(promise: Promise<unknown>): Promise<Error> {
    try {
        await promise;
    } catch (e) {
        if (e instanceof Error) return e;
        throw e;
    }
    return expect.fail('Expected promise to reject');
}

export const getPort = (server: net.Server) => {
    const address = server.address();
    if (!address || typeof address === 'string') {
        throw new Error('Server is not listening on a TCP port');
    }
    return address.port;
};

// Unlike fetch, this doesn't decode the body, so we can see exactly what was sent
export async function httpGetRaw(
    url: string,
    headers: http.OutgoingHttpHeaders = {}
): Promise<{ response: http.IncomingMessage, body: Buffer }> {
    const response = await httpGetResponse(url, headers);
    const body = await streamConsumers.buffer(response);
    return { response, body };
}

export async function httpGetResponse(
    url: string,
    headers: http.OutgoingHttpHeaders = {}
): Promise<http.IncomingMessage> {
    return new Promise<http.IncomingMessage>((resolve, reject) => {
        const req = http.request(url, { headers }, resolve);
        req.on('error', reject);
        req.end();
    });
}
