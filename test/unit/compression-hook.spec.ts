import * as zlib from 'node:zlib';
import { expect } from 'chai';

import {
    CompressibleResponse,
    CompressionConfigError,
    CompressionHook,
    Encodings,
    ResponseBody,
    collectBody,
    compressResponse
} from '../../src/compression/index.js';

const gzipRequest = { headers: { 'accept-encoding': 'gzip' } };

const buildResponse = (headers: Record<string, string>, body = 'hello world') =>
    new CompressibleResponse(200, headers, ResponseBody.from(body));

async function readBody(response: CompressibleResponse) {
    const body = response.takeBody();
    if (!body) throw new Error('Response had no body');
    return collectBody(body);
}

describe("Compression hook", () => {

    let hook: CompressionHook;

    beforeEach(() => {
        hook = new CompressionHook();
    });

    it("leaves excluded image responses alone", async () => {
        hook.onStartup({});
        const response = buildResponse({ 'content-type': 'image/png' });

        hook.onResponse(gzipRequest, response);

        expect(response.hasHeader('content-encoding')).to.equal(false);
        expect((await readBody(response)).toString()).to.equal('hello world');
    });

    it("gzips an HTML response", async () => {
        hook.onStartup({});
        const response = buildResponse({ 'content-type': 'text/html' });

        hook.onResponse(gzipRequest, response);

        expect(response.getHeader('content-encoding')).to.equal('gzip');
        const compressed = await readBody(response);
        expect(zlib.gunzipSync(compressed).toString()).to.equal('hello world');
    });

    it("never touches an already-encoded response", async () => {
        hook.onStartup({ encodings: ['gzip', 'br'] });
        const response = buildResponse({
            'content-type': 'text/html',
            'content-encoding': 'identity'
        });

        hook.onResponse({ headers: { 'accept-encoding': 'gzip, br' } }, response);

        expect(response.getHeader('content-encoding')).to.equal('identity');
        expect((await readBody(response)).toString()).to.equal('hello world');
    });

    it("replaces the default exclusions with a custom list", async () => {
        hook.onStartup({ exclude: ['application/x-custom'] });

        const image = buildResponse({ 'content-type': 'image/png' });
        hook.onResponse(gzipRequest, image);
        expect(image.getHeader('content-encoding')).to.equal('gzip');

        const custom = buildResponse({ 'content-type': 'application/x-custom' });
        hook.onResponse(gzipRequest, custom);
        expect(custom.hasHeader('content-encoding')).to.equal(false);
    });

    it("picks gzip for 'gzip, br' when only gzip is enabled", async () => {
        hook.onStartup({});
        const response = buildResponse({ 'content-type': 'text/plain' });

        hook.onResponse({ headers: { 'accept-encoding': 'gzip, br' } }, response);

        expect(response.getHeader('content-encoding')).to.equal('gzip');
        expect(zlib.gunzipSync(await readBody(response)).toString()).to.equal('hello world');
    });

    it("uses Brotli when enabled and requested", async () => {
        hook.onStartup({ encodings: ['br', 'gzip'] });
        const response = buildResponse({ 'content-type': 'text/plain' });

        hook.onResponse({ headers: { 'accept-encoding': 'gzip, br' } }, response);

        expect(response.getHeader('content-encoding')).to.equal('br');
        expect(zlib.brotliDecompressSync(await readBody(response)).toString()).to.equal('hello world');
    });

    it("uses the default exclusions before startup", () => {
        const response = buildResponse({ 'content-type': 'video/mp4' });
        hook.onResponse(gzipRequest, response);
        expect(response.hasHeader('content-encoding')).to.equal(false);
    });

    it("fails startup given a malformed exclusion", () => {
        expect(() => hook.onStartup({ exclude: ['images'] })).to.throw(CompressionConfigError);
    });

    it("keeps its previous config if startup fails", () => {
        hook.onStartup({ exclude: ['text/*'] });
        expect(() => hook.onStartup({ exclude: ['bad'] })).to.throw(CompressionConfigError);
        expect(hook.currentConfig.exclusions).to.deep.equal([{ top: 'text', sub: '*' }]);
    });

    describe("compressResponse", () => {
        it("compresses regardless of content type by default", async () => {
            const response = buildResponse({ 'content-type': 'image/png' });

            expect(compressResponse(gzipRequest, response)).to.deep.equal(Encodings.Gzip);
            expect(response.getHeader('content-encoding')).to.equal('gzip');
        });

        it("still respects existing encodings", () => {
            const response = buildResponse({ 'content-encoding': 'br' });

            expect(compressResponse(gzipRequest, response)).to.equal(undefined);
            expect(response.getHeader('content-encoding')).to.equal('br');
        });

        it("reports nothing applied when there's no body", () => {
            const response = new CompressibleResponse(204, { 'content-type': 'text/plain' });

            expect(compressResponse(gzipRequest, response)).to.equal(undefined);
            expect(response.hasHeader('content-encoding')).to.equal(false);
        });
    });

});
