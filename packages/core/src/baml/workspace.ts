/**
 * @license
 * Copyright 2025 BrowserOS
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

import {mkdtemp, rm} from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import {logger as defaultLogger} from '@dynamic-extract/common';
import type {Logger} from '@dynamic-extract/common';

export const WORKSPACE_PREFIX = 'dynamic-extract-';

export interface WorkspaceOptions {
  prefix?: string;
  /** Parent directory; the OS temp dir when omitted. */
  root?: string;
  logger?: Logger;
}

/**
 * Run `fn` inside a freshly created, uniquely named directory and remove the
 * directory afterwards, whether `fn` resolves or throws. A failed removal is
 * logged and never replaces the outcome of `fn`.
 */
export async function withWorkspace<T>(
  fn: (workspace: string) => Promise<T>,
  options: WorkspaceOptions = {},
): Promise<T> {
  const logger = options.logger ?? defaultLogger;
  const workspace = await mkdtemp(
    path.join(options.root ?? os.tmpdir(), options.prefix ?? WORKSPACE_PREFIX),
  );
  logger.debug('Workspace created', {workspace});

  try {
    return await fn(workspace);
  } finally {
    try {
      await rm(workspace, {recursive: true, force: true});
      logger.debug('Workspace removed', {workspace});
    } catch (error) {
      logger.warn('Failed to remove workspace', {
        workspace,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
