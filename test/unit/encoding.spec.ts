import { expect } from 'chai';

import {
    Encodings,
    encodingExt,
    encodingsEqual,
    formatEncoding,
    parseEncoding
} from '../../src/compression/index.js';

describe("Encoding registry", () => {

    const standardTokens = {
        chunked: Encodings.Chunked,
        br: Encodings.Brotli,
        gzip: Encodings.Gzip,
        deflate: Encodings.Deflate,
        compress: Encodings.Compress,
        identity: Encodings.Identity,
        trailers: Encodings.Trailers
    };

    Object.entries(standardTokens).forEach(([token, encoding]) => {
        it(`parses and formats '${token}'`, () => {
            expect(parseEncoding(token)).to.deep.equal(encoding);
            expect(formatEncoding(encoding)).to.equal(token);
        });
    });

    it("parses 'br' as Brotli", () => {
        expect(parseEncoding('br')).to.deep.equal({ kind: 'brotli' });
    });

    it("keeps unknown tokens as extensions", () => {
        expect(parseEncoding('zstd')).to.deep.equal({ kind: 'extension', token: 'zstd' });
        expect(formatEncoding(parseEncoding('zstd'))).to.equal('zstd');
    });

    it("is case-sensitive", () => {
        expect(parseEncoding('GZIP')).to.deep.equal({ kind: 'extension', token: 'GZIP' });
    });

    it("preserves odd extension tokens verbatim", () => {
        for (const token of ['', ' gzip', 'x-custom;q=0.5', 'brotli']) {
            expect(formatEncoding(parseEncoding(token))).to.equal(token);
        }
    });

    it("compares encodings by value", () => {
        expect(encodingsEqual(parseEncoding('gzip'), Encodings.Gzip)).to.equal(true);
        expect(encodingsEqual(encodingExt('x-a'), encodingExt('x-a'))).to.equal(true);
        expect(encodingsEqual(encodingExt('x-a'), encodingExt('x-b'))).to.equal(false);
        expect(encodingsEqual(encodingExt('gzip'), Encodings.Gzip)).to.equal(false);
    });

});
