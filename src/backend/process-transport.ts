/**
 * Process Transport
 *
 * Owns one tool server child process:
 * - Spawns it with piped stdio, the resolved environment and working directory
 * - Reads stdout line by line and hands each line to the protocol layer
 * - Reads stderr line by line as diagnostics only
 * - Writes whole lines to stdin
 * - Terminates it (SIGTERM, then SIGKILL) and always releases its streams
 */

import { spawn, type ChildProcess, type SpawnOptions } from 'node:child_process';
import { createInterface, type Interface } from 'node:readline';
import type { Readable } from 'node:stream';
import _ from 'lodash';
import { dynamicLogger as logger } from '../utils/silent-logger.js';
import { settlesWithin } from '../utils/timeout.js';
import { BrokenPipeError, SpawnError } from './errors.js';

export interface TransportHandlers {
    /** One complete stdout line, without its terminator */
    onLine:    (line: string) => void
    onStderr?: (line: string) => void
    /**
     * Fires once, after the process has exited and its stdio has closed, or
     * `exitGraceMs` after the exit when something else still holds the pipes
     */
    onExit?:   (code: number | null, signal: NodeJS.Signals | null) => void
}

/**
 * Where the protocol layer writes outgoing lines
 */
export interface LineSink {
    writeLine(text: string): Promise<void>
}

export interface Transport extends LineSink {
    readonly pid:   number | undefined
    readonly alive: boolean
    terminate(timeoutMs: number): Promise<void>
}

export interface TransportSpawnOptions {
    /** argv vector; the first element is the executable */
    command: string[]
    env:     Record<string, string>
    cwd?:    string
    /** Used in log lines */
    label?:       string
    /** How long to wait for stdio to close after the process exits (default 500) */
    exitGraceMs?: number
}

export const DEFAULT_EXIT_GRACE_MS = 500;

export type TransportFactory = (options: TransportSpawnOptions, handlers: TransportHandlers) => Promise<Transport>;

export type SpawnFunction = (command: string, args: string[], options: SpawnOptions) => ChildProcess;

function errorMessage(error: unknown): string {
    return _.isError(error) ? error.message : String(error);
}

/**
 * Transport over a spawned child process's stdio
 */
export class ProcessTransport implements Transport {
    private exited = false;
    private spawned = false;
    private exitReported = false;
    private exitGraceTimer?: NodeJS.Timeout;
    private terminatePromise?: Promise<void>;
    private readonly exitPromise: Promise<void>;
    private readonly readers: Interface[] = [];
    private readonly label: string;

    private constructor(private readonly child: ChildProcess, options: TransportSpawnOptions, private readonly handlers: TransportHandlers) {
        this.label = options.label ?? options.command.join(' ');
        const exitGraceMs = options.exitGraceMs ?? DEFAULT_EXIT_GRACE_MS;

        this.exitPromise = new Promise<void>((resolve) => {
            child.once('exit', (code: number | null, signal: NodeJS.Signals | null) => {
                this.exited = true;
                logger.info({ transport: this.label, pid: child.pid, code, signal }, 'Tool server process exited');
                // A wrapper such as npx can exit while its own child keeps stdout open
                this.exitGraceTimer = setTimeout(() => {
                    logger.warn({ transport: this.label, pid: child.pid, exitGraceMs }, 'Tool server stdio still open after exit');
                    this.reportExit(code, signal);
                }, exitGraceMs);
                this.exitGraceTimer.unref();
                resolve();
            });
        });

        child.once('close', (code: number | null, signal: NodeJS.Signals | null) => {
            this.reportExit(code, signal);
        });

        // Without these, an EPIPE on a dead child would surface as an uncaught exception
        child.stdin?.on('error', (error: Error) => {
            logger.debug({ transport: this.label, error: error.message }, 'Tool server stdin error');
        });
        child.stdout?.on('error', (error: Error) => {
            logger.debug({ transport: this.label, error: error.message }, 'Tool server stdout error');
        });
        child.stderr?.on('error', (error: Error) => {
            logger.debug({ transport: this.label, error: error.message }, 'Tool server stderr error');
        });

        if(child.stdout) {
            this.attachReader(child.stdout, line => this.handlers.onLine(line), 'stdout');
        }
        if(child.stderr) {
            this.attachReader(child.stderr, (line) => {
                if(this.handlers.onStderr) {
                    this.handlers.onStderr(line);
                } else {
                    logger.debug({ transport: this.label }, line);
                }
            }, 'stderr');
        }
    }

    /**
     * Spawn a process and wait until the OS has started it.
     *
     * @throws SpawnError if the executable cannot be started
     */
    static async spawn(options: TransportSpawnOptions, handlers: TransportHandlers, spawnProcess: SpawnFunction = spawn): Promise<ProcessTransport> {
        const [executable, ...args] = options.command;
        if(executable === undefined || executable.length === 0) {
            throw new SpawnError(options.command, 'command is empty');
        }

        logger.info({ command: executable, args, cwd: options.cwd }, 'Spawning tool server');

        let child: ChildProcess;
        try {
            child = spawnProcess(executable, args, {
                env:   options.env,
                cwd:   options.cwd,
                stdio: ['pipe', 'pipe', 'pipe'],
            });
        } catch (error) {
            throw new SpawnError(options.command, errorMessage(error), { cause: error });
        }

        const transport = new ProcessTransport(child, options, handlers);
        await transport.waitForSpawn(options.command);
        return transport;
    }

    get pid(): number | undefined {
        return this.child.pid;
    }

    get alive(): boolean {
        return this.spawned && !this.exited;
    }

    /**
     * Write `text` plus a newline in a single write call. The bytes are queued
     * synchronously; the returned promise settles once they are flushed.
     *
     * @throws BrokenPipeError if the process no longer accepts input
     */
    writeLine(text: string): Promise<void> {
        const stdin = this.child.stdin;
        if(!this.alive || this.terminatePromise !== undefined || !stdin || stdin.destroyed || !stdin.writable) {
            return Promise.reject(new BrokenPipeError('process is not accepting input'));
        }

        return new Promise<void>((resolve, reject) => {
            stdin.write(`${text}\n`, (error?: Error | null) => {
                if(error) {
                    reject(new BrokenPipeError(error.message, { cause: error }));
                } else {
                    resolve();
                }
            });
        });
    }

    /**
     * Ask the process to exit, wait up to `timeoutMs`, force-kill it if it is
     * still running, then release all stdio streams. Safe to call repeatedly;
     * later calls share the first call's outcome.
     */
    terminate(timeoutMs: number): Promise<void> {
        this.terminatePromise ??= this.runTermination(timeoutMs);
        return this.terminatePromise;
    }

    private async runTermination(timeoutMs: number): Promise<void> {
        try {
            if(this.spawned && !this.exited) {
                this.sendSignal('SIGTERM');
                if(!(await settlesWithin(this.exitPromise, timeoutMs))) {
                    logger.warn({ transport: this.label, pid: this.pid, timeoutMs }, 'Tool server did not exit gracefully, killing');
                    this.sendSignal('SIGKILL');
                    if(!(await settlesWithin(this.exitPromise, timeoutMs))) {
                        logger.error({ transport: this.label, pid: this.pid }, 'Tool server still running after SIGKILL');
                    }
                }
            }
        } finally {
            this.releaseStreams();
        }
    }

    private reportExit(code: number | null, signal: NodeJS.Signals | null): void {
        clearTimeout(this.exitGraceTimer);
        if(this.exitReported) {
            return;
        }
        this.exitReported = true;
        if(this.spawned) {
            this.handlers.onExit?.(code, signal);
        }
    }

    private sendSignal(signal: NodeJS.Signals): void {
        try {
            this.child.kill(signal);
        } catch (error) {
            logger.warn({ transport: this.label, pid: this.pid, signal, error: errorMessage(error) }, 'Failed to signal tool server');
        }
    }

    private releaseStreams(): void {
        for(const reader of this.readers) {
            reader.close();
        }
        this.readers.length = 0;

        for(const stream of [this.child.stdin, this.child.stdout, this.child.stderr]) {
            try {
                stream?.destroy();
            } catch (error) {
                logger.warn({ transport: this.label, error: errorMessage(error) }, 'Failed to close tool server stream');
            }
        }
    }

    private attachReader(input: Readable, onLine: (line: string) => void, stream: 'stdout' | 'stderr'): void {
        const reader = createInterface({ input, crlfDelay: Infinity });
        reader.on('line', (line: string) => {
            try {
                onLine(line);
            } catch (error) {
                logger.error({ transport: this.label, stream, error: errorMessage(error) }, 'Line handler failed');
            }
        });
        this.readers.push(reader);
    }

    private waitForSpawn(command: string[]): Promise<void> {
        return new Promise<void>((resolve, reject) => {
            const onSpawn = (): void => {
                this.child.removeListener('error', onError);
                this.spawned = true;
                this.child.on('error', (error: Error) => {
                    logger.error({ transport: this.label, pid: this.pid, error: error.message }, 'Tool server process error');
                });
                logger.info({ transport: this.label, pid: this.pid }, 'Tool server spawned');
                resolve();
            };
            const onError = (error: Error): void => {
                this.child.removeListener('spawn', onSpawn);
                this.releaseStreams();
                reject(new SpawnError(command, error.message, { cause: error }));
            };

            this.child.once('spawn', onSpawn);
            this.child.once('error', onError);
        });
    }
}

/**
 * Default factory used by the client facade
 */
export const spawnProcessTransport: TransportFactory = async (options, handlers) => ProcessTransport.spawn(options, handlers);

export default ProcessTransport;
