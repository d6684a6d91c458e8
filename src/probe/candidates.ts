/**
 * Candidate stack routes and payload casings for active probing.
 *
 * Each probe is one route template crossed with one key casing. Templates use
 * `{endpointId}` and `{stackId}` placeholders and are relative to the base URL.
 */

import {
    CreatePayload,
    KeyCasing,
    ProbeMethod,
    StackEnvVar,
    UpdatePayload,
} from '../portainer/types';

/** Stack file content every server should reject */
export const INVALID_STACK_CONTENT = 'this-is-not-a-compose-file';

export interface RouteCandidate {
    method: ProbeMethod;
    template: string;
}

export interface RouteContext {
    endpointId: number;
    stackId?: string;
}

export interface ProbeRequest {
    label: string;
    method: ProbeMethod;
    url: string;
    payload: CreatePayload | UpdatePayload;
}

/** Historical and current create routes */
export const CREATE_ROUTES: readonly RouteCandidate[] = [
    { method: 'POST', template: '/api/stacks?type=2&method=string&endpointId={endpointId}' },
    { method: 'POST', template: '/api/stacks?type=1&method=string&endpointId={endpointId}' },
    { method: 'POST', template: '/api/stacks/create/standalone/string?endpointId={endpointId}' },
    { method: 'POST', template: '/api/stacks/create/standalone/string?type=2&endpointId={endpointId}' },
    { method: 'POST', template: '/api/stacks/create/swarm/string?endpointId={endpointId}' },
];

/** Update routes for an existing stack */
export const UPDATE_ROUTES: readonly RouteCandidate[] = [
    { method: 'PUT', template: '/api/stacks/{stackId}?endpointId={endpointId}' },
    { method: 'PUT', template: '/api/stacks/{stackId}?endpointId={endpointId}&method=string' },
    { method: 'PUT', template: '/api/stacks/{stackId}?endpointId={endpointId}&type=2' },
];

/** Stack resource URLs queried with OPTIONS to read the Allow header */
export const OPTIONS_ROUTES: readonly RouteCandidate[] = [
    { method: 'OPTIONS', template: '/api/stacks/{stackId}?endpointId={endpointId}' },
    { method: 'OPTIONS', template: '/api/stacks/{stackId}' },
];

/** Casing order per flow: create tries capitalized keys first, update lower-case. */
export const CREATE_CASINGS: readonly KeyCasing[] = ['caps', 'lower'];
export const UPDATE_CASINGS: readonly KeyCasing[] = ['lower', 'caps'];

/**
 * Fills `{endpointId}` and `{stackId}` in a route template.
 * @throws Error if the template needs a stack ID and none is given
 */
export function expandRoute(baseUrl: string, template: string, context: RouteContext): string {
    const path = template.replace(/\{(endpointId|stackId)\}/g, (_match, key: string) => {
        if (key === 'endpointId') {
            return String(context.endpointId);
        }
        if (context.stackId === undefined) {
            throw new Error(`Route ${template} requires a stack ID`);
        }
        return encodeURIComponent(context.stackId);
    });
    return `${baseUrl}${path}`;
}

export function buildCreatePayload(casing: KeyCasing, name: string, content: string): CreatePayload {
    const env: StackEnvVar[] = [];
    if (casing === 'caps') {
        return { Name: name, StackFileContent: content, Env: env };
    }
    return { name, stackFileContent: content, env };
}

export function buildUpdatePayload(casing: KeyCasing, content: string): UpdatePayload {
    const env: StackEnvVar[] = [];
    if (casing === 'caps') {
        return { StackFileContent: content, Env: env, Prune: true, PullImage: true };
    }
    return { stackFileContent: content, env, prune: true, pullImage: true };
}

/** Unique-enough stack name for create probes, e.g. `probe-my-app-1700000000`. */
export function probeStackName(stackName: string, now: Date): string {
    return `probe-${stackName}-${Math.floor(now.getTime() / 1000)}`;
}

/**
 * Every create route crossed with every create casing, route-major.
 */
export function planCreateProbes(
    baseUrl: string,
    context: RouteContext,
    stackName: string,
    now: Date
): ProbeRequest[] {
    const name = probeStackName(stackName, now);
    return CREATE_ROUTES.flatMap((route) =>
        CREATE_CASINGS.map((casing) => ({
            label: `create (${casing} keys)`,
            method: route.method,
            url: expandRoute(baseUrl, route.template, context),
            payload: buildCreatePayload(casing, name, INVALID_STACK_CONTENT),
        }))
    );
}

/**
 * Every update route crossed with every update casing, route-major.
 */
export function planUpdateProbes(baseUrl: string, context: RouteContext): ProbeRequest[] {
    return UPDATE_ROUTES.flatMap((route) =>
        UPDATE_CASINGS.map((casing) => ({
            label: `update (${casing} keys)`,
            method: route.method,
            url: expandRoute(baseUrl, route.template, context),
            payload: buildUpdatePayload(casing, INVALID_STACK_CONTENT),
        }))
    );
}
