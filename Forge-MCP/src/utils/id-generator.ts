/**
 * ID generators using Node's built-in crypto.
 */

import { randomUUID } from 'node:crypto';

function shortId(): string {
  return randomUUID().replace(/-/g, '').slice(0, 12);
}

export function generateExecutionId(): string {
  return `exec_${shortId()}`;
}

export function generateEnvironmentId(): string {
  return `env_${shortId()}`;
}

export function generateServiceId(): string {
  return `svc_${shortId()}`;
}
