import { MaybePromise } from '@httptoolkit/util';

import { compressResponse } from './compress.js';
import {
    CompressionConfig,
    CompressionOptions,
    DEFAULT_COMPRESSION_CONFIG,
    buildCompressionConfig
} from './config.js';
import { formatMediaType } from './media-type.js';
import type { CompressionRequest, CompressibleResponse } from './response.js';

/**
 * Something a server runs once when it starts, and then against every
 * response before it's written.
 */
export interface ResponseHook<Options = unknown> {
    readonly name: string;
    onStartup(options: Options): MaybePromise<void>;
    onResponse(request: CompressionRequest, response: CompressibleResponse): MaybePromise<void>;
}

/**
 * Compresses every eligible response with gzip (or Brotli, if enabled).
 *
 * Responses with content types matching the exclusion list are left alone.
 * By default that's application/gzip, application/zip, image/*, video/*,
 * application/wasm and application/octet-stream. Passing `exclude` replaces
 * that list completely.
 */
export class CompressionHook implements ResponseHook<CompressionOptions> {

    readonly name = 'Response compression';

    private config: CompressionConfig = DEFAULT_COMPRESSION_CONFIG;

    get currentConfig() {
        return this.config;
    }

    // Throws on bad config: the server should refuse to start.
    onStartup(options: CompressionOptions) {
        this.config = buildCompressionConfig(options);

        console.log(`${this.name} enabled (${
            [...this.config.encodings].join(', ')
        }), excluding ${
            this.config.exclusions.map(formatMediaType).join(', ') || 'nothing'
        }`);
    }

    onResponse(request: CompressionRequest, response: CompressibleResponse) {
        compressResponse(request, response, this.config);
    }
}
