/**
 * Portainer API shapes the probe reads or sends.
 * Responses are treated as best-effort: only the fields listed here are read,
 * and each may arrive under more than one casing.
 */

/** Environment variable in Portainer stack format */
export interface StackEnvVar {
    name: string;
    value: string;
}

/** HTTP methods the probe issues */
export type ProbeMethod = 'GET' | 'POST' | 'PUT' | 'OPTIONS';

/** Payload key casing conventions seen across Portainer versions */
export type KeyCasing = 'caps' | 'lower';

/** Outcome of one request: either a response, or a transport failure */
export type ProbeResult =
    | {
          kind: 'response';
          statusCode: number;
          statusMessage: string;
          httpVersion: string;
          headers: Record<string, string>;
          body: string;
      }
    | {
          kind: 'no-response';
          error: string;
      };

/** Legacy create payload (POST /api/stacks?type=2&method=string) */
export interface CapsCreateStackRequest {
    Name: string;
    StackFileContent: string;
    Env: StackEnvVar[];
}

/** Create payload for POST /api/stacks/create/standalone/string */
export interface CreateStackRequest {
    name: string;
    stackFileContent: string;
    env: StackEnvVar[];
}

/** Update payload for PUT /api/stacks/{id} */
export interface UpdateStackRequest {
    stackFileContent: string;
    env: StackEnvVar[];
    prune: boolean;
    pullImage: boolean;
}

/** Capitalized update payload accepted by some older releases */
export interface CapsUpdateStackRequest {
    StackFileContent: string;
    Env: StackEnvVar[];
    Prune: boolean;
    PullImage: boolean;
}

export type CreatePayload = CapsCreateStackRequest | CreateStackRequest;
export type UpdatePayload = UpdateStackRequest | CapsUpdateStackRequest;

/** The parts of a Swagger/OpenAPI document the probe inspects */
export interface ApiDocument {
    paths?: Record<string, Record<string, unknown>>;
    components?: { schemas?: Record<string, unknown> };
    /** Swagger 2.0 equivalent of components.schemas */
    definitions?: Record<string, unknown>;
}

/** Loosely-typed JSON object from a listing response */
export type JsonRecord = Record<string, unknown>;
