/**
 * API key resolution.
 * Handles direct key passthrough and 1Password secret references.
 */

import * as core from '@actions/core';
import * as exec from '@actions/exec';
import * as io from '@actions/io';
import { CredentialSource } from '../config';
import { ConfigError, MissingDependencyError } from '../utils/errors';

const SECRET_CLI = 'op';

interface ResolveOptions {
    /** Register the key with the Actions log masker */
    maskSecrets: boolean;
}

/**
 * Gets the Portainer API key.
 *
 * A directly supplied key is returned as-is. A secret reference is resolved by
 * running `op read <reference>` and capturing its stdout. The key itself is never
 * logged.
 *
 * @throws MissingDependencyError if the `op` CLI is not on PATH
 * @throws ConfigError if `op` fails or prints nothing
 */
export async function resolveApiKey(
    credential: CredentialSource,
    options: ResolveOptions
): Promise<string> {
    let apiKey: string;

    if (credential.kind === 'direct') {
        core.info('Using PORTAINER_API_KEY from the environment');
        apiKey = credential.apiKey;
    } else {
        core.info('Resolving Portainer API key from 1Password reference...');
        apiKey = await readSecretReference(credential.reference);
    }

    if (options.maskSecrets) {
        core.setSecret(apiKey);
    }

    return apiKey;
}

async function readSecretReference(reference: string): Promise<string> {
    const cliPath = await io.which(SECRET_CLI, false);
    if (cliPath === '') {
        throw new MissingDependencyError(SECRET_CLI);
    }

    let stdout = '';
    let stderr = '';
    const exitCode = await exec.exec(cliPath, ['read', reference], {
        ignoreReturnCode: true,
        silent: true, // stdout is the secret
        listeners: {
            stdout: (data: Buffer) => {
                stdout += data.toString();
            },
            stderr: (data: Buffer) => {
                stderr += data.toString();
            },
        },
    });

    if (exitCode !== 0) {
        throw new ConfigError(
            `${SECRET_CLI} read failed with exit code ${exitCode}: ${stderr.trim() || 'no output'}. ` +
            'Check OP_PORTAINER_API_KEY_REF and that you are signed in to 1Password.'
        );
    }

    const secret = stdout.replace(/[\r\n]+$/, '');
    if (secret === '') {
        throw new ConfigError(`${SECRET_CLI} read returned an empty value for OP_PORTAINER_API_KEY_REF`);
    }

    return secret;
}
