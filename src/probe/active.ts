/**
 * Opt-in route probing with payloads the server should reject.
 * Nothing here is meant to create, change or delete a stack.
 */

import * as core from '@actions/core';
import { ProbeConfig } from '../config';
import { PortainerProbeClient } from '../portainer/client';
import { ConfigError } from '../utils/errors';
import {
    OPTIONS_ROUTES,
    ProbeRequest,
    expandRoute,
    planCreateProbes,
    planUpdateProbes,
} from './candidates';
import { formatResponseHead, printLines, printProbeResult } from './printer';

/** Statuses suggesting the server took an update it should have rejected */
const ACCEPTED_STATUSES = [200, 204];

async function sendAll(
    client: PortainerProbeClient,
    requests: ProbeRequest[],
    warnOnSuccess: boolean
): Promise<void> {
    for (const request of requests) {
        const result = await client.send(request.method, request.url, request.payload);
        printProbeResult(request.label, request.method, request.url, result);

        if (warnOnSuccess && result.kind === 'response' && ACCEPTED_STATUSES.includes(result.statusCode)) {
            core.warning(
                `${request.method} ${request.url} returned HTTP ${result.statusCode} — ` +
                'the invalid stack content may have been accepted. Check the stack in Portainer.'
            );
        }
    }
}

/**
 * Posts invalid stack content to every candidate create route, in both key
 * casings, and prints each response.
 */
export async function probeCreateRoutes(
    client: PortainerProbeClient,
    config: ProbeConfig,
    now: Date = new Date()
): Promise<void> {
    core.info('');
    core.info('== Probing common CREATE endpoints (safe) ==');
    core.info('This uses intentionally invalid stack content so Portainer should reject it.');
    core.info('Interpretation: HTTP 404 => route not present; HTTP 400/401/403 => route exists.');

    const requests = planCreateProbes(
        config.portainer.url,
        { endpointId: config.stack.endpointId },
        config.stack.stackName,
        now
    );
    await sendAll(client, requests, false);
}

/**
 * Puts invalid stack content to every candidate update route, then checks the
 * stack resource with OPTIONS. DELETE commands are printed, never sent.
 *
 * @throws ConfigError if no existing stack ID is configured
 */
export async function probeUpdateRoutes(
    client: PortainerProbeClient,
    config: ProbeConfig
): Promise<void> {
    const { stackId, endpointId } = config.stack;
    if (stackId === undefined) {
        throw new ConfigError('Set STACK_ID to probe update/delete routes (e.g. STACK_ID=80).');
    }

    const baseUrl = config.portainer.url;
    const context = { endpointId, stackId };

    core.info('');
    core.info('== Probing UPDATE endpoints (safe-ish) ==');
    core.info('This uses intentionally invalid stack content; Portainer should reject it.');
    core.info(
        'Interpretation: HTTP 404/405 => route not present; HTTP 400/500 => route exists; ' +
        'HTTP 200/204 => WARNING (it may have accepted the update).'
    );

    await sendAll(client, planUpdateProbes(baseUrl, context), true);

    core.info('');
    core.info('== Probing DELETE support (no deletion performed) ==');
    core.info('Uses OPTIONS to discover whether DELETE is allowed on the stack resource.');
    core.info("If you're behind a reverse proxy, OPTIONS may return 405 even when DELETE is permitted.");

    for (const route of OPTIONS_ROUTES) {
        const url = expandRoute(baseUrl, route.template, context);
        core.info('');
        core.info('-- options');
        core.info(`OPTIONS ${url}`);

        const result = await client.options(url);
        printLines(formatResponseHead(result));

        if (result.kind === 'response' && result.headers['allow'] !== undefined) {
            core.info(`Allowed methods: ${result.headers['allow']}`);
        }
    }

    const resourceUrl = expandRoute(baseUrl, OPTIONS_ROUTES[0].template, context);
    core.info('');
    core.info('If DELETE is allowed, the usual delete call is:');
    core.info(`  curl -sS -i -X DELETE -H "X-API-Key: $PORTAINER_API_KEY" "${resourceUrl}"`);
    core.info('If that fails for an external stack, try:');
    core.info(`  curl -sS -i -X DELETE -H "X-API-Key: $PORTAINER_API_KEY" "${resourceUrl}&external=true"`);
}
