#!/usr/bin/env node
/**
 * Main entry point for the stack probe.
 * Orchestrates: configuration → API key → discovery → manual commands → opt-in probes.
 */

import * as core from '@actions/core';
import * as fs from 'fs';
import * as path from 'path';
import { getConfig, ProbeEnv } from './config';
import { resolveApiKey } from './secrets/resolve';
import { PortainerProbeClient } from './portainer/client';
import { runDiscovery } from './probe/discovery';
import { renderManualCommands } from './probe/templates';
import { probeCreateRoutes, probeUpdateRoutes } from './probe/active';
import { FatalProbeError } from './utils/errors';

/**
 * Runs the whole probe and returns the process exit code: 0 on completion
 * (whatever the probed routes answered), 2 on unmet preconditions, 1 otherwise.
 */
export async function run(env: ProbeEnv = process.env): Promise<number> {
    try {
        // Step 1: Parse and validate inputs
        const config = getConfig(env);

        // Step 2: Resolve the API key before any request is made
        const apiKey = await resolveApiKey(config.credential, { maskSecrets: config.maskSecrets });

        core.info(`Portainer base URL: ${config.portainer.url}`);
        core.info(`Endpoint ID: ${config.stack.endpointId}`);
        core.info(`Stack name: ${config.stack.stackName}`);
        core.info(`Stack file: ${config.stack.stackFile}`);
        if (config.stack.stackId !== undefined) {
            core.info(`Stack id (probe): ${config.stack.stackId}`);
        }

        if (!fs.existsSync(path.resolve(config.stack.stackFile))) {
            core.warning(
                `Stack file not found: ${config.stack.stackFile} — the manual commands below read it with cat`
            );
        }

        // Step 3: Read-only discovery
        const client = new PortainerProbeClient(apiKey, {
            tlsSkipVerify: config.portainer.tlsSkipVerify,
            timeoutSeconds: config.portainer.timeoutSeconds,
        });

        core.info('');
        await runDiscovery(client, config);

        // Step 4: Commands to try by hand
        core.info('');
        core.info('== Manual curl commands to try ==');
        core.info(renderManualCommands(config));

        // Step 5: Opt-in probes
        if (config.flags.probeCreateRoutes) {
            await probeCreateRoutes(client, config);
        }
        if (config.flags.probeUpdateRoutes) {
            await probeUpdateRoutes(client, config);
        }

        return 0;
    } catch (error) {
        if (error instanceof FatalProbeError) {
            process.stderr.write(`${error.message}\n`);
            if (env.GITHUB_ACTIONS === 'true') {
                core.error(error.message);
            }
            return error.exitCode;
        }
        const message = error instanceof Error ? error.message : String(error);
        core.setFailed(`❌ Probe failed: ${message}`);
        return 1;
    }
}

if (require.main === module) {
    void run().then((exitCode) => {
        process.exitCode = exitCode;
    });
}
