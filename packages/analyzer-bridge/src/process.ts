/**
 * Analyzer Process - Low-level subprocess IPC wrapper
 *
 * Manages the analyzer subprocess using JSON-RPC over stdin/stdout.
 * This class handles ONLY IPC mechanics (spawn, readline, events).
 * Request correlation, timeouts and cancellation live in AnalyzerBridge.
 */

import type { ChildProcess } from 'child_process';
import { spawn } from 'child_process';
import { EventEmitter } from 'events';
import * as readline from 'readline';

/**
 * Low-level wrapper for the analyzer subprocess.
 *
 * Emits 'message' (one stdout line), 'stderr', 'exit' and 'error'.
 * Subclasses may replace `spawn`, `send`, `kill` and `isAlive` to run an
 * analyzer in process (tests do this).
 *
 * @example
 * ```ts
 * const proc = new AnalyzerProcess();
 * proc.on('message', (line) => console.log('Got:', line));
 * proc.spawn('quill-analyzer', ['--stdio']);
 * proc.send('{"jsonrpc":"2.0","id":1,"method":"get_version","params":{}}');
 * proc.kill();
 * ```
 */
export class AnalyzerProcess extends EventEmitter {
    private process: ChildProcess | null = null;
    private readlineInterface: readline.Interface | null = null;
    private _command = '';

    /**
     * Start the analyzer subprocess.
     *
     * Reads stdout line by line so that a JSON message is never split.
     *
     * @param command - Analyzer executable
     * @param args - Arguments passed to the executable
     * @param env - Environment variables merged over the server's own
     * @throws Error if already spawned or the pipes cannot be created
     */
    spawn(command: string, args: readonly string[] = [], env: NodeJS.ProcessEnv = {}): void {
        if (this.process) {
            throw new Error('AnalyzerProcess already spawned. Call kill() first.');
        }

        this._command = command;
        this.process = spawn(command, [...args], {
            stdio: ['pipe', 'pipe', 'pipe'],
            env: { ...process.env, ...env },
        });

        if (!this.process.stdout || !this.process.stdin) {
            this.process = null;
            throw new Error('Failed to create stdin/stdout pipes for analyzer subprocess');
        }

        this.readlineInterface = readline.createInterface({
            input: this.process.stdout,
            crlfDelay: Infinity,
        });

        this.readlineInterface.on('line', (line) => {
            this.emit('message', line);
        });

        this.process.stderr?.on('data', (data: Buffer) => {
            this.emit('stderr', data.toString());
        });

        this.process.on('close', (code) => {
            this.emit('exit', code);
            this.process = null;
            this.readlineInterface = null;
        });

        this.process.on('error', (err) => {
            this.emit('error', err);
            this.process = null;
            this.readlineInterface = null;
        });
    }

    /**
     * Write one JSON message followed by a newline.
     *
     * @throws Error if process is not running or stdin is not writable
     */
    send(json: string): void {
        if (!this.process?.stdin?.writable) {
            throw new Error('AnalyzerProcess not running or stdin not writable');
        }
        this.process.stdin.write(json + '\n');
    }

    /**
     * Close the line reader and send SIGTERM.
     */
    kill(): void {
        this.readlineInterface?.close();
        this.process?.kill('SIGTERM');
        this.process = null;
        this.readlineInterface = null;
    }

    isAlive(): boolean {
        return this.process !== null && !this.process.killed;
    }

    get pid(): number | null {
        return this.process?.pid ?? null;
    }

    get command(): string {
        return this._command;
    }
}
