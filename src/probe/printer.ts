/**
 * Renders probe results for a human reader.
 */

import * as core from '@actions/core';
import { ProbeMethod, ProbeResult } from '../portainer/types';

const RESPONSE_HEAD_MAX_LINES = 25;

/**
 * Pretty-prints a JSON body with two-space indentation, or returns the raw text
 * (minus trailing newlines) when it does not parse.
 */
export function formatBody(body: string): string {
    try {
        return JSON.stringify(JSON.parse(body), null, 2);
    } catch {
        return body.replace(/[\r\n]+$/, '');
    }
}

/** `HTTP 404`, or `HTTP 000 (no response: ...)` for transport failures. */
export function formatStatusLine(result: ProbeResult): string {
    if (result.kind === 'no-response') {
        return `HTTP 000 (no response: ${result.error})`;
    }
    return `HTTP ${result.statusCode}`;
}

/** Status line followed by the formatted body, if any. */
export function formatResult(result: ProbeResult): string[] {
    const lines = [formatStatusLine(result)];
    if (result.kind === 'response' && result.body !== '') {
        lines.push(formatBody(result.body));
    }
    return lines;
}

export function formatProbeResult(
    label: string,
    method: ProbeMethod,
    url: string,
    result: ProbeResult
): string[] {
    return ['', `-- ${label}`, `${method} ${url}`, ...formatResult(result)];
}

/**
 * Renders a response the way `curl -i` shows it: status line, headers, blank
 * line, body. Truncated to the first 25 lines.
 */
export function formatResponseHead(result: ProbeResult): string[] {
    if (result.kind === 'no-response') {
        return [formatStatusLine(result)];
    }

    const statusLine = `HTTP/${result.httpVersion} ${result.statusCode} ${result.statusMessage}`.trimEnd();
    const headerLines = Object.entries(result.headers).map(([name, value]) => `${name}: ${value}`);
    const bodyLines = result.body === '' ? [] : result.body.replace(/[\r\n]+$/, '').split(/\r?\n/);

    return [statusLine, ...headerLines, '', ...bodyLines].slice(0, RESPONSE_HEAD_MAX_LINES);
}

export function printLines(lines: string[]): void {
    for (const line of lines) {
        core.info(line);
    }
}

export function printProbeResult(
    label: string,
    method: ProbeMethod,
    url: string,
    result: ProbeResult
): void {
    printLines(formatProbeResult(label, method, url, result));
}
