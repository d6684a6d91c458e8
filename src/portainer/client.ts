/**
 * Portainer probe client.
 * Sends one request per call and reports whatever comes back, including failures.
 */

import * as core from '@actions/core';
import * as http from '@actions/http-client';
import { IncomingHttpHeaders } from 'http';
import { ProbeMethod, ProbeResult } from './types';

const USER_AGENT = 'portainer-stack-probe';

export interface ProbeClientOptions {
    /** Skip TLS certificate verification */
    tlsSkipVerify: boolean;
    /** Socket timeout per request, in seconds */
    timeoutSeconds: number;
}

export class PortainerProbeClient {
    private client: http.HttpClient;
    private apiKey: string;

    constructor(apiKey: string, options: ProbeClientOptions) {
        this.apiKey = apiKey;

        if (options.tlsSkipVerify) {
            core.warning(
                '⚠️ TLS certificate verification is DISABLED. ' +
                'This is acceptable for self-signed certs in homelabs but should not be used in production.'
            );
        }

        // Redirects are reported as-is: following one would re-send the key elsewhere
        this.client = new http.HttpClient(USER_AGENT, undefined, {
            allowRedirects: false,
            allowRetries: false,
            ignoreSslError: options.tlsSkipVerify,
            socketTimeout: options.timeoutSeconds * 1000,
        });
    }

    /**
     * Sends a single request. A payload, when given, is serialized as JSON.
     * Transport failures are returned as a `no-response` result, never thrown.
     */
    async send(method: ProbeMethod, url: string, payload?: unknown): Promise<ProbeResult> {
        const headers: Record<string, string> = { 'X-API-Key': this.apiKey };
        let data: string | null = null;

        if (payload !== undefined) {
            headers['Content-Type'] = 'application/json';
            data = JSON.stringify(payload);
        }

        if (core.isDebug()) {
            core.debug(`${method} ${url}`);
        }

        try {
            const response = await this.client.request(method, url, data, headers);
            const body = await response.readBody();
            return {
                kind: 'response',
                statusCode: response.message.statusCode || 0,
                statusMessage: response.message.statusMessage || '',
                httpVersion: response.message.httpVersion || '1.1',
                headers: flattenHeaders(response.message.headers),
                body,
            };
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            if (core.isDebug()) {
                core.debug(`${method} ${url} failed: ${message}`);
            }
            return { kind: 'no-response', error: message };
        }
    }

    /**
     * Sends an OPTIONS request, used to read the Allow header.
     */
    async options(url: string): Promise<ProbeResult> {
        return this.send('OPTIONS', url);
    }
}

function flattenHeaders(headers: IncomingHttpHeaders | undefined): Record<string, string> {
    const flat: Record<string, string> = {};
    for (const [name, value] of Object.entries(headers ?? {})) {
        if (value === undefined) {
            continue;
        }
        flat[name] = Array.isArray(value) ? value.join(', ') : value;
    }
    return flat;
}
