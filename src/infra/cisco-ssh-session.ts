import { Client, type ClientChannel } from 'ssh2';
import { createChildLogger } from '../utils/logger.js';
import { TimeoutError, withTimeout } from '../utils/async-helpers.js';
import { CommandError, ConnectError, errorMessage, type FailureKind } from '../utils/errors.js';
import type { DeviceCredentials, DeviceSession, Target } from '../types/session.js';

const logger = createChildLogger('cisco-ssh');

const SSH_CONNECT_TIMEOUT = 15000;
const SSH_COMMAND_TIMEOUT = 30000;

export const PAGING_OFF_COMMAND = 'terminal length 0';
const ENABLE_COMMAND = 'enable';

// "Switch01>" or "Switch01#" at the very end of the buffer
const PROMPT_PATTERN = /(?:^|\n)([A-Za-z0-9][\w.\-/()]*)([>#])[ \t]*$/;
const PASSWORD_PROMPT_PATTERN = /Password:[ \t]*$/i;
const ENABLE_REJECTED_PATTERN = /% (?:Access denied|Bad secrets|No password set)/;
const AUTHORIZATION_FAILED_PATTERN = /% Authorization failed/;

export interface SessionOptions {
  connectTimeoutMs?: number | undefined;
  commandTimeoutMs?: number | undefined;
}

export interface Prompt {
  hostname: string;
  privileged: boolean;
}

export interface ShellChannel {
  write(data: string): boolean;
  on(event: 'data', listener: (chunk: Buffer | string) => void): unknown;
  on(event: 'close', listener: () => void): unknown;
  end(): unknown;
}

export function matchPrompt(buffer: string): Prompt | null {
  const match = PROMPT_PATTERN.exec(buffer.replace(/\r/g, ''));
  if (!match?.[1]) return null;
  return { hostname: match[1], privileged: match[2] === '#' };
}

export function cleanCommandOutput(raw: string, command: string): string {
  const lines = raw.replace(/\r\n/g, '\n').replace(/\r/g, '').split('\n');

  if (lines.length > 0 && lines[0]?.trimEnd().endsWith(command)) {
    lines.shift();
  }
  const last = lines[lines.length - 1];
  if (last !== undefined && matchPrompt(last)) {
    lines.pop();
  }
  return lines.join('\n');
}

export function classifyConnectFailure(err: Error & { level?: string | undefined }): FailureKind {
  if (err.level === 'client-authentication') return 'auth';
  if (err.level === 'client-timeout' || /timed out/i.test(err.message)) return 'timeout';
  return 'transport';
}

interface PendingRead {
  until: (buffer: string) => boolean;
  resolve: (output: string) => void;
  reject: (err: Error) => void;
  timer: NodeJS.Timeout;
}

export class CiscoSshSession implements DeviceSession {
  private buffer = '';
  private pending: PendingRead | null = null;
  private closed = false;
  private disposed = false;
  private hostname: string | null = null;
  private readonly commandTimeoutMs: number;

  private constructor(
    private readonly channel: ShellChannel,
    private readonly host: string,
    options: SessionOptions,
    private readonly closeTransport: () => void
  ) {
    this.commandTimeoutMs = options.commandTimeoutMs ?? SSH_COMMAND_TIMEOUT;

    channel.on('data', (chunk) => {
      this.buffer += typeof chunk === 'string' ? chunk : chunk.toString('utf8');
      this.checkPending();
    });
    channel.on('close', () => {
      this.closed = true;
      this.failPending(new Error('Shell channel closed by device'));
    });
  }

  /**
   * Authenticates, elevates with the enable secret and turns paging off.
   * Every failure on the way is a ConnectError and leaves nothing open.
   */
  static async open(target: Target, credentials: DeviceCredentials, options: SessionOptions = {}): Promise<CiscoSshSession> {
    const connectTimeout = options.connectTimeoutMs ?? SSH_CONNECT_TIMEOUT;
    const client = new Client();

    const channel = await connectShell(client, target, credentials, connectTimeout).catch((err: unknown) => {
      client.end();
      throw err;
    });

    return CiscoSshSession.fromShell(channel, target, credentials.secret, options, () => client.end());
  }

  static async fromShell(
    channel: ShellChannel,
    host: string,
    secret: string,
    options: SessionOptions,
    closeTransport: () => void
  ): Promise<CiscoSshSession> {
    const session = new CiscoSshSession(channel, host, options, closeTransport);
    const connectTimeout = options.connectTimeoutMs ?? SSH_CONNECT_TIMEOUT;

    try {
      await session.handshake(secret, connectTimeout);
    } catch (err) {
      await session.close();
      if (err instanceof ConnectError) throw err;
      let kind: FailureKind = 'transport';
      if (err instanceof TimeoutError) kind = 'timeout';
      else if (err instanceof CommandError) kind = err.kind;
      throw new ConnectError(kind, host, `Session setup on ${host} failed: ${errorMessage(err)}`, {
        cause: err instanceof Error ? err : undefined,
      });
    }

    logger.info({ host, hostname: session.hostname }, 'Privileged session established');
    return session;
  }

  private async handshake(secret: string, timeoutMs: number): Promise<void> {
    const banner = await this.readUntil(buf => matchPrompt(buf) !== null, timeoutMs);
    let prompt = matchPrompt(banner);

    if (prompt && !prompt.privileged) {
      this.send(ENABLE_COMMAND);
      const challenge = await this.readUntil(
        buf => PASSWORD_PROMPT_PATTERN.test(buf) || matchPrompt(buf) !== null,
        timeoutMs
      );
      let reply = challenge;
      if (PASSWORD_PROMPT_PATTERN.test(challenge)) {
        this.send(secret);
        reply = await this.readUntil(
          buf => matchPrompt(buf) !== null || PASSWORD_PROMPT_PATTERN.test(buf),
          timeoutMs
        );
      }
      prompt = matchPrompt(reply);
      if (!prompt?.privileged || ENABLE_REJECTED_PATTERN.test(reply)) {
        throw new ConnectError('auth', this.host, `Privilege elevation rejected on ${this.host}`);
      }
    }

    this.hostname = prompt?.hostname ?? null;
    await this.execute(PAGING_OFF_COMMAND);
  }

  async execute(command: string): Promise<string> {
    if (this.closed) {
      throw new CommandError('transport', command, 'Session is closed');
    }
    if (this.pending) {
      throw new CommandError('transport', command, 'Another command is still running on this session');
    }

    this.send(command);
    let raw: string;
    try {
      raw = await this.readUntil(buf => this.isPrivilegedPrompt(buf), this.commandTimeoutMs);
    } catch (err) {
      if (err instanceof TimeoutError) {
        throw new CommandError('timeout', command, `Command timed out after ${this.commandTimeoutMs}ms`, { cause: err });
      }
      throw new CommandError('transport', command, `Command failed: ${errorMessage(err)}`, {
        cause: err instanceof Error ? err : undefined,
      });
    }

    if (AUTHORIZATION_FAILED_PATTERN.test(raw)) {
      throw new CommandError('auth', command, `Command not authorized on ${this.host}`);
    }

    logger.debug({ host: this.host, command, bytes: raw.length }, 'Command completed');
    return cleanCommandOutput(raw, command);
  }

  async close(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    this.closed = true;
    this.failPending(new Error('Session closed'));
    try {
      this.channel.end();
    } catch (err) {
      logger.debug({ host: this.host, err: errorMessage(err) }, 'Shell channel already gone');
    }
    this.closeTransport();
    logger.info({ host: this.host }, 'Session closed');
  }

  private isPrivilegedPrompt(buffer: string): boolean {
    const prompt = matchPrompt(buffer);
    if (!prompt?.privileged) return false;
    return this.hostname === null || prompt.hostname === this.hostname;
  }

  private send(line: string): void {
    this.buffer = '';
    this.channel.write(`${line}\n`);
  }

  private readUntil(until: (buffer: string) => boolean, timeoutMs: number): Promise<string> {
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending = null;
        reject(new TimeoutError(`No prompt after ${timeoutMs}ms`, timeoutMs));
      }, timeoutMs);
      this.pending = { until, resolve, reject, timer };
      if (this.closed) {
        this.failPending(new Error('Shell channel closed by device'));
        return;
      }
      this.checkPending();
    });
  }

  private checkPending(): void {
    const pending = this.pending;
    if (!pending || !pending.until(this.buffer)) return;
    clearTimeout(pending.timer);
    this.pending = null;
    const output = this.buffer;
    this.buffer = '';
    pending.resolve(output);
  }

  private failPending(err: Error): void {
    const pending = this.pending;
    if (!pending) return;
    clearTimeout(pending.timer);
    this.pending = null;
    pending.reject(err);
  }
}

function connectShell(
  client: Client,
  host: string,
  credentials: DeviceCredentials,
  timeoutMs: number
): Promise<ClientChannel> {
  const ready = new Promise<void>((resolve, reject) => {
    client.on('ready', () => resolve());
    client.on('error', (err) => {
      const kind = classifyConnectFailure(err);
      logger.warn({ host, kind, err: err.message }, 'SSH connection failed');
      reject(new ConnectError(kind, host, `SSH connection to ${host} failed: ${err.message}`, { cause: err }));
    });
    // IOS commonly offers keyboard-interactive instead of plain password auth
    client.on('keyboard-interactive', (_name, _instructions, _lang, prompts, finish) => {
      finish(prompts.map(() => credentials.password));
    });

    client.connect({
      host,
      port: credentials.port,
      username: credentials.username,
      password: credentials.password,
      tryKeyboard: true,
      readyTimeout: timeoutMs,
    });
  });

  const shell = ready.then(() => new Promise<ClientChannel>((resolve, reject) => {
    client.shell({ term: 'vt100', cols: 512, rows: 24 }, (err, stream) => {
      if (err) {
        reject(new ConnectError('transport', host, `Could not open a shell on ${host}: ${err.message}`, { cause: err }));
        return;
      }
      resolve(stream);
    });
  }));

  return withTimeout(shell, timeoutMs + 1000, `SSH connection to ${host} timed out`).catch((err: unknown) => {
    if (err instanceof ConnectError) throw err;
    throw new ConnectError('timeout', host, errorMessage(err), { cause: err instanceof Error ? err : undefined });
  });
}
