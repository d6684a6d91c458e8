/**
 * Capability discovery: status, API documentation, existing stacks and
 * environments. Read-only; every step runs even if an earlier one fails.
 */

import * as core from '@actions/core';
import { ProbeConfig } from '../config';
import { PortainerProbeClient } from '../portainer/client';
import { ApiDocument, JsonRecord, ProbeResult } from '../portainer/types';
import { formatResult, printLines } from './printer';

/** Documentation locations, JSON first. Only the JSON one is parsed. */
export const API_DOC_PATHS = ['/api/swagger.json', '/api/swagger.yaml', '/api/swagger.yml'] as const;

const STACKS_PATH_PATTERN = /(^|\/)stacks($|\/|\?)/;
const ACTION_KEYWORD_PATTERN = /create|update|standalone|compose|swarm|git/i;
const STACK_SCHEMA_PATTERN = /stack|compose|swarm/i;

export interface StackPath {
    path: string;
    /** Operation keys of the path item, sorted */
    methods: string[];
}

export interface DiscoveryResult {
    /** Path of the documentation that answered, if any */
    apiDocPath?: string;
    /** Parsed JSON documentation, when found and valid */
    apiDoc?: ApiDocument;
    /** ID of the stack matching the configured name and endpoint */
    existingStackId?: string;
}

function isRecord(value: unknown): value is JsonRecord {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJson(body: string): unknown {
    try {
        return JSON.parse(body);
    } catch {
        return undefined;
    }
}

/** Reads the first casing variant that is present (not null/undefined). */
function firstOf(entry: JsonRecord, ...keys: string[]): unknown {
    for (const key of keys) {
        const value = entry[key];
        if (value !== undefined && value !== null) {
            return value;
        }
    }
    return undefined;
}

/** Keeps only the documentation fields the probe reads, with their shapes checked. */
export function toApiDocument(raw: JsonRecord): ApiDocument {
    const doc: ApiDocument = {};
    if (isRecord(raw.paths)) {
        doc.paths = Object.fromEntries(
            Object.entries(raw.paths).map(([path, item]): [string, JsonRecord] => [
                path,
                isRecord(item) ? item : {},
            ])
        );
    }
    if (isRecord(raw.components) && isRecord(raw.components.schemas)) {
        doc.components = { schemas: raw.components.schemas };
    }
    if (isRecord(raw.definitions)) {
        doc.definitions = raw.definitions;
    }
    return doc;
}

function isOk(result: ProbeResult): result is Extract<ProbeResult, { kind: 'response' }> {
    return result.kind === 'response' && result.statusCode === 200;
}

/**
 * Paths that address the stacks resource, in document order, with their methods.
 */
export function findStackPaths(doc: ApiDocument): StackPath[] {
    return Object.entries(doc.paths ?? {})
        .filter(([path]) => STACKS_PATH_PATTERN.test(path))
        .map(([path, item]) => ({
            path,
            methods: Object.keys(item).sort(),
        }));
}

/**
 * Sorted stack paths whose text suggests a create or update operation.
 */
export function findLikelyCreateUpdatePaths(doc: ApiDocument): string[] {
    return Object.keys(doc.paths ?? {})
        .sort()
        .filter((path) => path.includes('stacks') && ACTION_KEYWORD_PATTERN.test(path));
}

/**
 * Sorted schema names that look like stack payload models.
 * Reads OpenAPI 3 `components.schemas`, falling back to Swagger 2 `definitions`.
 */
export function findStackSchemas(doc: ApiDocument): string[] {
    const schemas = doc.components?.schemas ?? doc.definitions ?? {};
    return Object.keys(schemas)
        .sort()
        .filter((name) => STACK_SCHEMA_PATTERN.test(name));
}

/**
 * Finds the ID of the first stack named `name` on `endpointId`.
 * Field names are read as Name/name, EndpointId/EndpointID and Id/ID, preferring
 * the first casing when both are present.
 */
export function findStackId(listing: unknown, name: string, endpointId: number): string | undefined {
    if (!Array.isArray(listing)) {
        return undefined;
    }

    for (const entry of listing) {
        if (!isRecord(entry)) {
            continue;
        }
        if (firstOf(entry, 'Name', 'name') !== name) {
            continue;
        }
        if (firstOf(entry, 'EndpointId', 'EndpointID') !== endpointId) {
            continue;
        }

        const id = firstOf(entry, 'Id', 'ID');
        if (typeof id === 'number' || typeof id === 'string') {
            return String(id);
        }
    }

    return undefined;
}

async function probeStatus(client: PortainerProbeClient, baseUrl: string): Promise<void> {
    core.info('== /api/status ==');
    const result = await client.send('GET', `${baseUrl}/api/status`);
    printLines(formatResult(result));

    if (isOk(result)) {
        const status = parseJson(result.body);
        if (isRecord(status) && typeof status.Version === 'string') {
            core.info(`Portainer version: ${status.Version}`);
        }
    }
}

async function fetchApiDoc(
    client: PortainerProbeClient,
    baseUrl: string
): Promise<Pick<DiscoveryResult, 'apiDocPath' | 'apiDoc'>> {
    core.info('== Swagger (best-effort) ==');

    for (const path of API_DOC_PATHS) {
        const result = await client.send('GET', `${baseUrl}${path}`);

        if (isOk(result) && result.body !== '') {
            if (!path.endsWith('.json')) {
                core.info(`Found: ${path} (YAML) — this probe only parses JSON.`);
                core.info(`You can inspect it manually: curl -H "X-API-Key: ..." ${baseUrl}${path}`);
                return { apiDocPath: path };
            }

            core.info(`Found: ${path}`);
            const doc = parseJson(result.body);
            if (!isRecord(doc)) {
                core.warning(`${path} did not contain a JSON object — skipping route analysis`);
                return { apiDocPath: path };
            }
            return { apiDocPath: path, apiDoc: toApiDocument(doc) };
        }

        core.info(`Tried ${path}: ${formatResult(result)[0]}`);
    }

    return {};
}

function printApiDocAnalysis(doc: ApiDocument): void {
    core.info('');
    core.info('== Stack-related endpoints (from swagger) ==');
    for (const { path, methods } of findStackPaths(doc)) {
        core.info('');
        core.info(path);
        core.info(`  methods: ${methods.join(', ')}`);
    }

    core.info('');
    core.info('== Hints: likely create/update routes ==');
    for (const path of findLikelyCreateUpdatePaths(doc)) {
        core.info(`  - ${path}`);
    }

    core.info('');
    core.info('If Portainer exposes request schemas here, search for stack payload models:');
    core.info(`  jq '.components.schemas | keys[] | select(test("stack|compose|swarm"; "i"))'`);

    const schemas = findStackSchemas(doc);
    if (schemas.length > 0) {
        core.info('Matching schemas in this document:');
        for (const name of schemas) {
            core.info(`  - ${name}`);
        }
    }
}

async function probeExistingStacks(
    client: PortainerProbeClient,
    config: ProbeConfig
): Promise<string | undefined> {
    const { stackName, endpointId } = config.stack;

    core.info('== Existing stacks (for this endpoint) ==');
    const result = await client.send('GET', `${config.portainer.url}/api/stacks`);
    if (!isOk(result)) {
        printLines(formatResult(result));
        return undefined;
    }

    core.info(formatResult(result)[0]);
    const stackId = findStackId(parseJson(result.body), stackName, endpointId);
    if (stackId !== undefined) {
        core.info(`Found stack: id=${stackId}`);
    } else {
        core.info(`No matching stack found for name='${stackName}' and endpointId=${endpointId}`);
    }
    return stackId;
}

async function probeEnvironments(client: PortainerProbeClient, config: ProbeConfig): Promise<void> {
    const { endpointId } = config.stack;

    core.info('== Environments ==');
    const result = await client.send('GET', `${config.portainer.url}/api/endpoints`);
    if (!isOk(result)) {
        printLines(formatResult(result));
        return;
    }

    core.info(formatResult(result)[0]);
    const listing = parseJson(result.body);
    if (!Array.isArray(listing)) {
        core.warning('Unexpected /api/endpoints response — expected a JSON array');
        return;
    }

    let configuredFound = false;
    for (const entry of listing.filter(isRecord)) {
        const id = firstOf(entry, 'Id', 'ID');
        const name = firstOf(entry, 'Name', 'name');
        core.info(`  - ID ${String(id)}: "${String(name)}"`);
        if (id === endpointId) {
            configuredFound = true;
        }
    }

    if (!configuredFound) {
        core.warning(`ENDPOINT_ID ${endpointId} is not among the environments listed above`);
    }
}

/**
 * Runs the discovery steps in order: status, API documentation (and its stack
 * routes), existing stacks, environments.
 */
export async function runDiscovery(
    client: PortainerProbeClient,
    config: ProbeConfig
): Promise<DiscoveryResult> {
    const baseUrl = config.portainer.url;

    await probeStatus(client, baseUrl);

    core.info('');
    const { apiDocPath, apiDoc } = await fetchApiDoc(client, baseUrl);
    if (apiDoc) {
        printApiDocAnalysis(apiDoc);
    }

    core.info('');
    const existingStackId = await probeExistingStacks(client, config);

    core.info('');
    await probeEnvironments(client, config);

    return { apiDocPath, apiDoc, existingStackId };
}
