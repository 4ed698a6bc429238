import { CompressibleResponse, ResponseBody } from '../../compression/index.js';

// Fixed content served by the demo endpoints. This lives outside the endpoint
// modules, since everything they export is registered as an endpoint.

export const HTML_PAGE = `<!doctype html>
<html>
<head>
    <title>Compression Example</title>
    <meta charset="utf-8" />
</head>
<body>
    <h1>Compression Example</h1>
    <p>This page is served as text/html, so it's compressed whenever the client accepts gzip.</p>
    <p>Repeated content compresses especially well. Repeated content compresses especially well.</p>
</body>
</html>
`;

export const EXAMPLE_DOCUMENT = {
    "catalog": {
        "title": "Example Catalog",
        "items": [
            { "id": 1, "name": "First item", "tags": ["example", "json"] },
            { "id": 2, "name": "Second item", "tags": ["example", "json"] },
            { "id": 3, "name": "Third item", "tags": ["example", "json"] }
        ]
    }
};

// A 1x1 transparent PNG
export const EXAMPLE_PNG = Buffer.from(
    'iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAQAAAC1HAwCAAAAC0lEQVR42mNkYAAAAAYAAjCB0C8AAAAASUVORK5CYII=',
    'base64'
);

export const buildPngResponse = () => new CompressibleResponse(200, {
    'content-type': 'image/png',
    'content-length': EXAMPLE_PNG.byteLength
}, ResponseBody.from(EXAMPLE_PNG));
