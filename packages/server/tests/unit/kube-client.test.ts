/**
 * Unit tests for kubeconfig loading
 */

import { describe, it, expect, beforeAll, afterAll } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { ErrorCode } from '@herald/shared';
import { contextNamespace, loadKubeConfig } from '../../src/kube/client.js';

const KUBECONFIG = `apiVersion: v1
kind: Config
clusters:
  - name: local
    cluster:
      server: https://127.0.0.1:6443
users:
  - name: dev
    user:
      token: test-token
contexts:
  - name: dev
    context:
      cluster: local
      user: dev
  - name: payments
    context:
      cluster: local
      user: dev
      namespace: payments
current-context: dev
`;

function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}

describe('loadKubeConfig', () => {
  let dir: string;
  let file: string;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'herald-kube-'));
    file = path.join(dir, 'config');
    fs.writeFileSync(file, KUBECONFIG);
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('loads the current context from a file', () => {
    const kubeConfig = loadKubeConfig({ kubeconfig: file });

    expect(kubeConfig.getCurrentContext()).toBe('dev');
    expect(contextNamespace(kubeConfig)).toBeUndefined();
  });

  it('switches to the requested context', () => {
    const kubeConfig = loadKubeConfig({ kubeconfig: file, context: 'payments' });

    expect(kubeConfig.getCurrentContext()).toBe('payments');
    expect(contextNamespace(kubeConfig)).toBe('payments');
  });

  it('rejects an unknown context', () => {
    expect(thrown(() => loadKubeConfig({ kubeconfig: file, context: 'staging' }))).toMatchObject({
      code: ErrorCode.KUBE_CONFIG_UNAVAILABLE,
      message: "Context 'staging' not found in kubeconfig",
    });
  });

  it('reports a missing file', () => {
    const missing = path.join(dir, 'absent');
    expect(thrown(() => loadKubeConfig({ kubeconfig: missing }))).toMatchObject({
      code: ErrorCode.KUBE_CONFIG_UNAVAILABLE,
      message: `Failed to load kubeconfig from ${missing}`,
    });
  });
});
