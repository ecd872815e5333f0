/**
 * @license
 * Copyright 2025 BrowserOS
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

import {spawn} from 'node:child_process';
import {stat} from 'node:fs/promises';
import path from 'node:path';

import {logger as defaultLogger} from '@dynamic-extract/common';
import type {Logger} from '@dynamic-extract/common';

import {
  BAMLCompilationError,
  CancellationError,
  ConfigurationError,
  TimeoutError,
} from '../errors.js';

import type {BamlProject} from './project.js';

export const DEFAULT_COMPILER_TIMEOUT_MS = 30_000;

export interface CompileOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
  logger?: Logger;
}

export interface CompileOutcome {
  /** Compiler output, kept for debug logging. */
  diagnostics: string;
  durationMs: number;
}

/**
 * Builds a materialized project. The pipeline only talks to this interface,
 * so tests can stand in a fake.
 */
export interface SchemaCompiler {
  /** Version the project's generator block must pin. */
  resolveVersion(options?: CompileOptions): Promise<string>;
  compile(project: BamlProject, options?: CompileOptions): Promise<CompileOutcome>;
}

interface ExecResult {
  code: number | null;
  stdout: string;
  stderr: string;
  durationMs: number;
}

export interface BamlCliCompilerOptions {
  /** Defaults to `BAML_CLI_PATH`, then `baml-cli` on PATH. */
  executablePath?: string;
  logger?: Logger;
}

/**
 * Runs `baml-cli generate` inside the project's workspace.
 */
export class BamlCliCompiler implements SchemaCompiler {
  private readonly executablePath: string;
  private readonly logger: Logger;
  private versionPromise: Promise<string> | null = null;

  constructor(options: BamlCliCompilerOptions = {}) {
    this.executablePath = options.executablePath || process.env.BAML_CLI_PATH || 'baml-cli';
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * The lookup runs once for all callers, free of any caller's signal; each
   * caller only stops waiting on its own abort or timeout.
   */
  resolveVersion(options: CompileOptions = {}): Promise<string> {
    if (!this.versionPromise) {
      const lookup = this.exec(['--version'], process.cwd(), {}).then((result) => {
        const output = `${result.stdout}\n${result.stderr}`;
        const match = /(\d+\.\d+\.\d+)/.exec(output);
        if (result.code !== 0 || !match) {
          throw new BAMLCompilationError(
            `Could not determine ${this.executablePath} version`,
            output.trim(),
          );
        }
        return match[1];
      });
      // A failed lookup is not cached.
      lookup.catch(() => {
        if (this.versionPromise === lookup) this.versionPromise = null;
      });
      this.versionPromise = lookup;
    }
    return this.waitFor(this.versionPromise, options, '--version');
  }

  private waitFor<T>(pending: Promise<T>, options: CompileOptions, label: string): Promise<T> {
    const timeoutMs = options.timeoutMs ?? DEFAULT_COMPILER_TIMEOUT_MS;
    const {signal} = options;
    const startTime = performance.now();

    return new Promise<T>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new CancellationError());
        return;
      }

      const cleanup = (): void => {
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
      };
      const timer = setTimeout(() => {
        cleanup();
        const elapsedMs = Math.round(performance.now() - startTime);
        reject(
          new TimeoutError(
            `${this.executablePath} ${label} timed out after ${elapsedMs}ms`,
            elapsedMs,
            timeoutMs,
          ),
        );
      }, timeoutMs);
      const onAbort = (): void => {
        cleanup();
        reject(new CancellationError());
      };
      signal?.addEventListener('abort', onAbort, {once: true});

      pending.then(
        (value) => {
          cleanup();
          resolve(value);
        },
        (error: unknown) => {
          cleanup();
          reject(error);
        },
      );
    });
  }

  async compile(project: BamlProject, options: CompileOptions = {}): Promise<CompileOutcome> {
    const logger = options.logger ?? this.logger;
    const result = await this.exec(['generate'], project.workspace, options);
    const diagnostics = [result.stdout, result.stderr].filter(Boolean).join('\n').trim();

    if (result.code !== 0) {
      throw new BAMLCompilationError(
        `BAML generation failed with exit code ${result.code}`,
        diagnostics,
        project.files['schema.baml'],
      );
    }

    const clientDir = path.join(project.workspace, 'baml_client');
    const generated = await stat(clientDir).then(
      (s) => s.isDirectory(),
      () => false,
    );
    if (!generated) {
      throw new BAMLCompilationError(
        'Generated baml_client directory not found',
        diagnostics,
        project.files['schema.baml'],
      );
    }

    logger.debug('BAML project compiled', {
      workspace: project.workspace,
      durationMs: result.durationMs,
    });
    return {diagnostics, durationMs: result.durationMs};
  }

  private exec(args: string[], cwd: string, options: CompileOptions): Promise<ExecResult> {
    const timeoutMs = options.timeoutMs ?? DEFAULT_COMPILER_TIMEOUT_MS;
    const {signal} = options;
    const startTime = performance.now();

    return new Promise<ExecResult>((resolve, reject) => {
      if (signal?.aborted) {
        reject(new CancellationError());
        return;
      }

      const child = spawn(this.executablePath, args, {cwd, env: process.env});
      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];
      let settled = false;

      const finish = (fn: () => void): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        fn();
      };

      const kill = (): void => {
        if (child.exitCode === null && !child.killed) {
          child.kill('SIGKILL');
        }
      };

      const timer = setTimeout(() => {
        kill();
        const elapsedMs = Math.round(performance.now() - startTime);
        finish(() =>
          reject(
            new TimeoutError(
              `${this.executablePath} ${args[0]} timed out after ${elapsedMs}ms`,
              elapsedMs,
              timeoutMs,
            ),
          ),
        );
      }, timeoutMs);

      const onAbort = (): void => {
        kill();
        finish(() => reject(new CancellationError()));
      };
      signal?.addEventListener('abort', onAbort, {once: true});

      child.stdout.on('data', (data: Buffer) => stdoutChunks.push(data));
      child.stderr.on('data', (data: Buffer) => stderrChunks.push(data));

      child.once('error', (error) => {
        finish(() => {
          if ('code' in error && error.code === 'ENOENT') {
            reject(
              new ConfigurationError(
                `BAML compiler not found at '${this.executablePath}'. Install @boundaryml/baml or set BAML_CLI_PATH`,
                'BAML_CLI_PATH',
              ),
            );
            return;
          }
          reject(
            new BAMLCompilationError(
              `Failed to run ${this.executablePath}: ${error.message}`,
              error.message,
            ),
          );
        });
      });

      child.once('close', (code) => {
        finish(() =>
          resolve({
            code,
            stdout: Buffer.concat(stdoutChunks).toString('utf8'),
            stderr: Buffer.concat(stderrChunks).toString('utf8'),
            durationMs: Math.round(performance.now() - startTime),
          }),
        );
      });
    });
  }
}
