/**
 * Tests for capability discovery.
 * Mocks @actions/http-client; responses are keyed by "METHOD url".
 */

const mockInfo = jest.fn();
const mockWarning = jest.fn();
jest.mock('@actions/core', () => ({
    info: mockInfo,
    warning: mockWarning,
    debug: jest.fn(),
    isDebug: jest.fn(),
}));

const mockRequest = jest.fn();
jest.mock('@actions/http-client', () => ({
    HttpClient: jest.fn().mockImplementation(() => ({
        request: mockRequest,
    })),
}));

import { ProbeConfig } from '../../config';
import { PortainerProbeClient } from '../../portainer/client';
import {
    findLikelyCreateUpdatePaths,
    findStackId,
    findStackPaths,
    findStackSchemas,
    runDiscovery,
    toApiDocument,
} from '../../probe/discovery';

const BASE = 'https://portainer.test';

function createMockResponse(statusCode: number, body: object | string) {
    return {
        message: { statusCode, statusMessage: '', httpVersion: '1.1', headers: {} },
        readBody: jest.fn().mockResolvedValue(typeof body === 'string' ? body : JSON.stringify(body)),
    };
}

/** Unlisted requests get an empty 404. */
function routeRequests(routes: Record<string, ReturnType<typeof createMockResponse> | Error>): void {
    mockRequest.mockImplementation(async (method: string, url: string) => {
        const route = routes[`${method} ${url}`];
        if (route instanceof Error) {
            throw route;
        }
        return route ?? createMockResponse(404, '');
    });
}

function infoLines(): string[] {
    return mockInfo.mock.calls.map((call) => String(call[0]));
}

const config: ProbeConfig = {
    portainer: { url: BASE, rawUrl: BASE, tlsSkipVerify: false, timeoutSeconds: 30 },
    credential: { kind: 'direct', apiKey: 'test-key' },
    stack: { stackName: 'app', stackFile: 'docker-compose.yml', endpointId: 2 },
    flags: { probeCreateRoutes: false, probeUpdateRoutes: false },
    maskSecrets: false,
};

const apiDoc = {
    paths: {
        '/api/stacks': { get: {}, post: {} },
        '/api/stacks/create/standalone/string': { post: {} },
        '/api/unrelated': { get: {} },
    },
};

describe('findStackPaths', () => {
    it('should return only stack paths with their sorted methods', () => {
        expect(findStackPaths(apiDoc)).toEqual([
            { path: '/api/stacks', methods: ['get', 'post'] },
            { path: '/api/stacks/create/standalone/string', methods: ['post'] },
        ]);
    });

    it('should require stacks to be a whole path segment', () => {
        const doc = { paths: { '/api/stackshare': { get: {} }, '/stacks?type=2': { post: {} } } };

        expect(findStackPaths(doc).map((p) => p.path)).toEqual(['/stacks?type=2']);
    });

    it('should return nothing when the document has no paths', () => {
        expect(findStackPaths({})).toEqual([]);
    });
});

describe('findLikelyCreateUpdatePaths', () => {
    it('should keep stack paths naming a create or update action', () => {
        expect(findLikelyCreateUpdatePaths(apiDoc)).toEqual(['/api/stacks/create/standalone/string']);
    });

    it('should match keywords case-insensitively and sort the result', () => {
        const doc = {
            paths: {
                '/api/stacks/{id}/Git/redeploy': { put: {} },
                '/api/stacks/create/swarm/repository': { post: {} },
            },
        };

        expect(findLikelyCreateUpdatePaths(doc)).toEqual([
            '/api/stacks/create/swarm/repository',
            '/api/stacks/{id}/Git/redeploy',
        ]);
    });
});

describe('findStackSchemas', () => {
    it('should read OpenAPI 3 component schemas', () => {
        const doc = {
            components: {
                schemas: {
                    'stacks.composeStackFromFileContentPayload': {},
                    'portainer.User': {},
                    'portainer.Stack': {},
                },
            },
        };

        expect(findStackSchemas(doc)).toEqual(['portainer.Stack', 'stacks.composeStackFromFileContentPayload']);
    });

    it('should fall back to Swagger 2 definitions', () => {
        const doc = { definitions: { 'stacks.swarmStackFromFileContentPayload': {}, 'portainer.Team': {} } };

        expect(findStackSchemas(doc)).toEqual(['stacks.swarmStackFromFileContentPayload']);
    });
});

describe('toApiDocument', () => {
    it('should keep only well-shaped fields', () => {
        const doc = toApiDocument({
            paths: { '/api/stacks': { get: {} }, '/api/broken': 'nope' },
            components: 'nope',
            definitions: { 'portainer.Stack': {} },
        });

        expect(doc).toEqual({
            paths: { '/api/stacks': { get: {} }, '/api/broken': {} },
            definitions: { 'portainer.Stack': {} },
        });
    });
});

describe('findStackId', () => {
    const listing = [
        { Name: 'app', EndpointId: 2, Id: 5 },
        { Name: 'app', EndpointID: 3, ID: 9 },
    ];

    it('should match name and endpoint ID', () => {
        expect(findStackId(listing, 'app', 2)).toBe('5');
    });

    it('should read the alternate field casings', () => {
        expect(findStackId(listing, 'app', 3)).toBe('9');
    });

    it('should return undefined when nothing matches', () => {
        expect(findStackId(listing, 'missing', 2)).toBeUndefined();
    });

    it('should report the first match in input order', () => {
        const duplicates = [
            { Name: 'app', EndpointId: 2, Id: 5 },
            { Name: 'app', EndpointId: 2, Id: 6 },
        ];

        expect(findStackId(duplicates, 'app', 2)).toBe('5');
    });

    it('should prefer the first casing when both are present', () => {
        const both = [{ Name: 'app', EndpointId: 2, EndpointID: 3, Id: 5, ID: 9 }];

        expect(findStackId(both, 'app', 2)).toBe('5');
        expect(findStackId(both, 'app', 3)).toBeUndefined();
    });

    it('should not coerce a string endpoint ID', () => {
        expect(findStackId([{ Name: 'app', EndpointId: '2', Id: 5 }], 'app', 2)).toBeUndefined();
    });

    it('should tolerate a non-array listing', () => {
        expect(findStackId({ message: 'Unauthorized' }, 'app', 2)).toBeUndefined();
    });
});

describe('runDiscovery', () => {
    it('should stop at a YAML document without parsing it', async () => {
        routeRequests({
            [`GET ${BASE}/api/status`]: createMockResponse(200, { Version: '2.19.4' }),
            [`GET ${BASE}/api/swagger.yaml`]: createMockResponse(200, 'swagger: "2.0"\n'),
            [`GET ${BASE}/api/stacks`]: createMockResponse(200, [{ Name: 'app', EndpointId: 2, Id: 5 }]),
            [`GET ${BASE}/api/endpoints`]: createMockResponse(200, [{ Id: 2, Name: 'local' }]),
        });
        const client = new PortainerProbeClient('test-key', { tlsSkipVerify: false, timeoutSeconds: 30 });

        const result = await runDiscovery(client, config);

        expect(result).toEqual({ apiDocPath: '/api/swagger.yaml', apiDoc: undefined, existingStackId: '5' });
        expect(mockRequest.mock.calls.map((call) => call[1])).toEqual([
            `${BASE}/api/status`,
            `${BASE}/api/swagger.json`,
            `${BASE}/api/swagger.yaml`,
            `${BASE}/api/stacks`,
            `${BASE}/api/endpoints`,
        ]);

        const lines = infoLines();
        expect(lines).toContain('Portainer version: 2.19.4');
        expect(lines).toContain('Tried /api/swagger.json: HTTP 404');
        expect(lines).toContain('Found: /api/swagger.yaml (YAML) — this probe only parses JSON.');
        expect(lines).toContain('Found stack: id=5');
        expect(lines).toContain('  - ID 2: "local"');
        expect(lines).not.toContain('== Stack-related endpoints (from swagger) ==');
        expect(mockWarning).not.toHaveBeenCalled();
    });

    it('should analyze a JSON document and keep going past failures', async () => {
        routeRequests({
            [`GET ${BASE}/api/status`]: new Error('socket hang up'),
            [`GET ${BASE}/api/swagger.json`]: createMockResponse(200, apiDoc),
            [`GET ${BASE}/api/stacks`]: createMockResponse(500, { message: 'boom' }),
            [`GET ${BASE}/api/endpoints`]: createMockResponse(200, [{ Id: 1, Name: 'local' }]),
        });
        const client = new PortainerProbeClient('test-key', { tlsSkipVerify: false, timeoutSeconds: 30 });

        const result = await runDiscovery(client, config);

        expect(result.apiDocPath).toBe('/api/swagger.json');
        expect(result.existingStackId).toBeUndefined();
        expect(mockRequest).toHaveBeenCalledTimes(4);

        const lines = infoLines();
        expect(lines).toContain('HTTP 000 (no response: socket hang up)');
        expect(lines).toContain('Found: /api/swagger.json');
        expect(lines).toContain('  methods: get, post');
        expect(lines).toContain('  - /api/stacks/create/standalone/string');
        expect(lines).toContain('HTTP 500');
        expect(lines).toContain('{\n  "message": "boom"\n}');
        expect(mockWarning).toHaveBeenCalledWith('ENDPOINT_ID 2 is not among the environments listed above');
    });

    it('should report when no stack matches', async () => {
        routeRequests({
            [`GET ${BASE}/api/stacks`]: createMockResponse(200, [{ Name: 'other', EndpointId: 2, Id: 7 }]),
        });
        const client = new PortainerProbeClient('test-key', { tlsSkipVerify: false, timeoutSeconds: 30 });

        await runDiscovery(client, config);

        expect(infoLines()).toContain("No matching stack found for name='app' and endpointId=2");
    });
});
