/**
 * Configuration module — reads and validates the probe's environment inputs.
 */

import { ConfigError } from './utils/errors';
import { normalizePortainerUrl } from './utils/url';

export interface PortainerConfig {
    /** Normalized base URL (e.g. https://host:9443), never ending in /api */
    url: string;
    /** URL exactly as supplied */
    rawUrl: string;
    /** Skip TLS certificate verification */
    tlsSkipVerify: boolean;
    /** Socket timeout per request, in seconds */
    timeoutSeconds: number;
}

/** Where the API key comes from. Resolved later by the secret resolver. */
export type CredentialSource =
    | { kind: 'direct'; apiKey: string }
    | { kind: 'reference'; reference: string };

export interface StackConfig {
    /** Stack name in Portainer */
    stackName: string;
    /** Path to the compose file used in the printed commands */
    stackFile: string;
    /** Portainer endpoint/environment ID */
    endpointId: number;
    /** Existing stack ID, needed for update probing */
    stackId?: string;
}

export interface ProbeFlags {
    probeCreateRoutes: boolean;
    probeUpdateRoutes: boolean;
}

export interface ProbeConfig {
    portainer: PortainerConfig;
    credential: CredentialSource;
    stack: StackConfig;
    flags: ProbeFlags;
    /** Register the resolved key with the Actions log masker */
    maskSecrets: boolean;
}

export type ProbeEnv = Record<string, string | undefined>;

const DEFAULT_ENDPOINT_ID = 2;
const DEFAULT_STACK_FILE = 'docker-compose.yml';
const DEFAULT_TIMEOUT_SECONDS = 30;
/** Node timers overflow past 2^31-1 ms */
const MAX_TIMEOUT_SECONDS = 2147483;

function read(env: ProbeEnv, name: string): string {
    return (env[name] ?? '').trim();
}

function readRequired(env: ProbeEnv, name: string): string {
    const value = read(env, name);
    if (value === '') {
        throw new ConfigError(`Set ${name}`);
    }
    return value;
}

function readFlag(env: ProbeEnv, name: string): boolean {
    const value = read(env, name).toLowerCase();
    return value === '1' || value === 'true';
}

function readPositiveInt(env: ProbeEnv, name: string, fallback: number, max?: number): number {
    const raw = read(env, name);
    if (raw === '') {
        return fallback;
    }
    if (!/^\d+$/.test(raw) || parseInt(raw, 10) < 1) {
        throw new ConfigError(`Invalid ${name} "${raw}" — must be a positive integer`);
    }
    const value = parseInt(raw, 10);
    if (max !== undefined && value > max) {
        throw new ConfigError(`Invalid ${name} "${raw}" — must be at most ${max}`);
    }
    return value;
}

/**
 * Reads and validates all probe inputs.
 * @param env - Environment to read from; defaults to the process environment
 * @throws ConfigError if required inputs are missing or invalid
 */
export function getConfig(env: ProbeEnv = process.env): ProbeConfig {
    // --- Portainer ---
    const rawUrl = readRequired(env, 'PORTAINER_URL');
    const stackName = readRequired(env, 'STACK_NAME');
    const tlsSkipVerify = readFlag(env, 'PORTAINER_TLS_SKIP_VERIFY');
    const timeoutSeconds = readPositiveInt(
        env,
        'PROBE_TIMEOUT_SECONDS',
        DEFAULT_TIMEOUT_SECONDS,
        MAX_TIMEOUT_SECONDS
    );

    // --- Stack ---
    const endpointId = readPositiveInt(env, 'ENDPOINT_ID', DEFAULT_ENDPOINT_ID);
    const stackFile = read(env, 'STACK_FILE') || DEFAULT_STACK_FILE;
    const stackId = read(env, 'STACK_ID') || undefined;

    // --- Credential: direct key wins over a 1Password reference ---
    const apiKey = read(env, 'PORTAINER_API_KEY');
    const reference = read(env, 'OP_PORTAINER_API_KEY_REF');
    let credential: CredentialSource;
    if (apiKey !== '') {
        credential = { kind: 'direct', apiKey };
    } else if (reference !== '') {
        credential = { kind: 'reference', reference };
    } else {
        throw new ConfigError(
            'Set PORTAINER_API_KEY or OP_PORTAINER_API_KEY_REF (1Password secret reference).'
        );
    }

    // --- Probe switches ---
    const flags: ProbeFlags = {
        probeCreateRoutes: readFlag(env, 'PROBE_CREATE_ROUTES'),
        probeUpdateRoutes: readFlag(env, 'PROBE_UPDATE_ROUTES'),
    };

    if (flags.probeUpdateRoutes && stackId === undefined) {
        throw new ConfigError('Set STACK_ID to probe update/delete routes (e.g. STACK_ID=80).');
    }

    return {
        portainer: {
            url: normalizePortainerUrl(rawUrl),
            rawUrl,
            tlsSkipVerify,
            timeoutSeconds,
        },
        credential,
        stack: {
            stackName,
            stackFile,
            endpointId,
            stackId,
        },
        flags,
        maskSecrets: env.GITHUB_ACTIONS === 'true',
    };
}
