/**
 * JobControl backed by child processes
 */

import { spawn, type ChildProcess } from 'child_process';
import { createReadStream, createWriteStream, rename, unlink, type WriteStream } from 'fs';
import { finished } from 'stream';
import { createConsoleLogger, type Logger } from '../core/logger';
import type { JobControl, JobId, JobStartOptions, JobWaitResult } from '../core/types';

/** Exit code reported when the command could not be spawned */
export const SPAWN_FAILED_EXIT_CODE = 127;

/** Result for ids this table never issued or has already reported finished */
export const UNKNOWN_JOB_EXIT_CODE = -1;

type StdioMode = 'pipe' | 'ignore';

export type SpawnProcess = (
  command: string,
  args: readonly string[],
  options: { cwd?: string; stdio: [StdioMode, StdioMode, 'pipe'] },
) => ChildProcess;

export interface ChildProcessJobControlOptions {
  logger?: Logger;
  /** Process factory, child_process.spawn by default */
  spawnProcess?: SpawnProcess;
}

interface JobRecord {
  command: string;
  exitCode: number | null;
  stderr: Buffer[];
}

interface CapturedOutput {
  path: string;
  partialPath: string;
  stream: WriteStream;
}

const defaultSpawn: SpawnProcess = (command, args, options) =>
  spawn(command, [...args], options);

/**
 * Finished jobs are dropped once `wait` has reported their exit code.
 */
export class ChildProcessJobControl implements JobControl {
  private nextId = 1;
  private readonly jobs = new Map<JobId, JobRecord>();
  private readonly logger: Logger;
  private readonly spawnProcess: SpawnProcess;

  constructor(options: ChildProcessJobControlOptions = {}) {
    this.logger = options.logger ?? createConsoleLogger();
    this.spawnProcess = options.spawnProcess ?? defaultSpawn;
  }

  start(command: string, args: readonly string[], options: JobStartOptions = {}): JobId {
    const id = this.nextId++;
    const job: JobRecord = { command, exitCode: null, stderr: [] };
    this.jobs.set(id, job);

    const { cwd, stdinFile, stdoutFile } = options;
    let child: ChildProcess;
    try {
      child = this.spawnProcess(command, args, {
        cwd,
        stdio: [stdinFile ? 'pipe' : 'ignore', stdoutFile ? 'pipe' : 'ignore', 'pipe'],
      });
    } catch (error) {
      this.fail(job, error);
      return id;
    }

    child.stderr?.on('data', (chunk: Buffer) => job.stderr.push(chunk));
    child.on('error', (error) => this.fail(job, error));

    if (stdinFile && child.stdin) {
      child.stdin.on('error', (error) => {
        this.logger.debug(`${command} closed stdin early: ${error.message}`);
      });
      createReadStream(stdinFile)
        .on('error', (error) => {
          this.fail(job, error);
          child.kill();
        })
        .pipe(child.stdin);
    }

    let output: CapturedOutput | undefined;
    if (stdoutFile && child.stdout) {
      const partialPath = `${stdoutFile}.part`;
      output = { path: stdoutFile, partialPath, stream: createWriteStream(partialPath) };
      output.stream.on('error', (error) => {
        this.logger.debug(`${command}: could not write ${stdoutFile}: ${error.message}`);
        child.kill();
      });
      child.stdout.pipe(output.stream);
    }

    child.on('close', (code) => {
      const exitCode = code ?? 1;
      if (output) {
        this.storeOutput(job, exitCode, output);
      } else {
        this.finish(job, exitCode);
      }
    });

    return id;
  }

  wait(jobIds: readonly JobId[]): JobWaitResult[] {
    return jobIds.map((id) => {
      const job = this.jobs.get(id);
      if (!job) return UNKNOWN_JOB_EXIT_CODE;
      if (job.exitCode === null) return 'running';
      this.jobs.delete(id);
      return job.exitCode;
    });
  }

  /**
   * Move captured stdout into place on success, remove it otherwise. The job
   * stays running until the file is settled.
   */
  private storeOutput(job: JobRecord, exitCode: number, output: CapturedOutput): void {
    finished(output.stream, (streamError) => {
      if (streamError || exitCode !== 0 || job.exitCode !== null) {
        unlink(output.partialPath, (unlinkError) => {
          if (unlinkError && unlinkError.code !== 'ENOENT') {
            this.logger.debug(`could not remove ${output.partialPath}: ${unlinkError.message}`);
          }
          this.finish(job, exitCode === 0 ? 1 : exitCode);
        });
        return;
      }

      rename(output.partialPath, output.path, (renameError) => {
        if (renameError) {
          this.logger.debug(`could not move output to ${output.path}: ${renameError.message}`);
          this.finish(job, 1);
          return;
        }
        this.finish(job, 0);
      });
    });
  }

  private finish(job: JobRecord, exitCode: number): void {
    if (job.exitCode !== null) return;
    job.exitCode = exitCode;
    if (exitCode !== 0) {
      const stderr = Buffer.concat(job.stderr).toString().trim();
      this.logger.debug(`${job.command} exited with code ${exitCode}${stderr ? `: ${stderr}` : ''}`);
    }
    job.stderr = [];
  }

  private fail(job: JobRecord, error: unknown): void {
    if (job.exitCode !== null) return;
    job.exitCode = SPAWN_FAILED_EXIT_CODE;
    job.stderr = [];
    const message = error instanceof Error ? error.message : String(error);
    this.logger.error(`Failed to start ${job.command}: ${message}`);
  }
}
