import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  DEVICE_CONFIG,
  DeviceConfig,
  DeviceCredentials,
} from '../../config/device.config';
import {
  AuthError,
  CommandError,
  ProtocolError,
  RateLimitError,
  UnreachableError,
} from '../errors/device-api.error';
import { CONSOLE_ENDPOINT } from '../interfaces/endpoint.interface';

export interface RequestOptions {
  signal?: AbortSignal;
}

interface DeviceResponse {
  readonly status: number;
  readonly text: string;
}

/**
 * Reply to a console command. The firmware answers either with JSON, which is
 * passed through, or with the console's plain-text output.
 */
export type ConsoleReply =
  | { readonly kind: 'json'; readonly command: string; readonly body: unknown }
  | {
      readonly kind: 'text';
      readonly command: string;
      readonly output: string;
      readonly exitCode: 0;
    };

const COMMAND_FAILURE_MARKER = 'returned non-zero error code';
const CONSOLE_ECHO_PREFIX = 'esp32>';

/**
 * Device HTTP Client
 *
 * Performs exactly one HTTP exchange per call and maps every failure onto the
 * DeviceApiError taxonomy. Retries and caching live in RetryingDeviceClient.
 *
 * Basic credentials are sent only when a password is configured. close()
 * aborts whatever is in flight and makes later calls fail fast.
 */
@Injectable()
export class DeviceHttpClient {
  private readonly logger = new Logger(DeviceHttpClient.name);
  private readonly lifecycle = new AbortController();
  private credentials: DeviceCredentials;

  constructor(@Inject(DEVICE_CONFIG) private readonly config: DeviceConfig) {
    this.credentials = config.credentials;
    this.logger.log(`Device client configured for ${config.baseUrl}`);
  }

  get baseUrl(): string {
    return this.config.baseUrl;
  }

  get isClosed(): boolean {
    return this.lifecycle.signal.aborted;
  }

  /**
   * Swap the credentials used for subsequent requests (re-authentication).
   */
  useCredentials(credentials: DeviceCredentials): void {
    this.credentials = credentials;
  }

  async get(path: string, options: RequestOptions = {}): Promise<unknown> {
    const { status, text } = await this.send(path, { method: 'GET' }, options);
    try {
      return JSON.parse(text);
    } catch (error) {
      throw new ProtocolError(
        `Response from ${this.urlFor(path)} is not valid JSON`,
        path,
        status,
        error,
      );
    }
  }

  /**
   * POST an urlencoded form and return the response body as text.
   */
  async postForm(
    path: string,
    form: Record<string, string>,
    options: RequestOptions = {},
    headers: Record<string, string> = {},
  ): Promise<string> {
    const { status, text } = await this.send(
      path,
      {
        method: 'POST',
        headers: {
          'Content-Type': 'application/x-www-form-urlencoded',
          ...headers,
        },
        body: new URLSearchParams(form).toString(),
      },
      options,
    );
    this.logger.debug(`POST ${path} -> ${status}: ${text.trim()}`);
    return text;
  }

  /**
   * Write one device parameter and persist it to non-volatile storage.
   */
  async writeParam(
    name: string,
    value: string,
    options: RequestOptions = {},
  ): Promise<void> {
    await this.postForm('/params.json', { k: name, v: value, store: '1' }, options);
  }

  async sendConsoleCommand(
    command: string,
    options: RequestOptions = {},
  ): Promise<ConsoleReply> {
    let text: string;
    try {
      text = await this.postForm(
        CONSOLE_ENDPOINT,
        { cmd: command },
        options,
        { Accept: 'application/json' },
      );
    } catch (error) {
      if (error instanceof ProtocolError && error.status === 400) {
        throw new ProtocolError(
          `Invalid command '${command}'`,
          CONSOLE_ENDPOINT,
          400,
          error,
        );
      }
      throw error;
    }
    return parseConsoleReply(command, text);
  }

  /**
   * Abort in-flight requests and refuse new ones.
   */
  close(): void {
    if (!this.lifecycle.signal.aborted) {
      this.lifecycle.abort();
      this.logger.log('Device client closed');
    }
  }

  private urlFor(path: string): string {
    return `${this.config.baseUrl}${path}`;
  }

  private authHeaders(): Record<string, string> {
    const { username, password } = this.credentials;
    if (!password) {
      return {};
    }
    const token = Buffer.from(`${username}:${password}`).toString('base64');
    return { Authorization: `Basic ${token}` };
  }

  /**
   * One exchange, body included. Timeouts and cancellation while waiting for
   * the headers or reading the body both surface as UnreachableError.
   */
  private async send(
    path: string,
    init: { method: string; headers?: Record<string, string>; body?: string },
    options: RequestOptions,
  ): Promise<DeviceResponse> {
    const url = this.urlFor(path);
    if (this.isClosed) {
      throw new UnreachableError(`Client closed; refusing request to ${url}`, path);
    }

    const timeout = AbortSignal.timeout(this.config.requestTimeoutMs);
    const signals = [this.lifecycle.signal, timeout];
    if (options.signal) {
      signals.push(options.signal);
    }

    const unreachable = (error: unknown): UnreachableError => {
      if (timeout.aborted) {
        return new UnreachableError(
          `Request to ${url} timed out after ${this.config.requestTimeoutMs}ms`,
          path,
          error,
        );
      }
      if (this.isClosed || options.signal?.aborted) {
        return new UnreachableError(`Request to ${url} was cancelled`, path, error);
      }
      const reason = error instanceof Error ? error.message : String(error);
      return new UnreachableError(`Connection error for ${url}: ${reason}`, path, error);
    };

    let response: Response;
    try {
      response = await fetch(url, {
        method: init.method,
        headers: { ...this.authHeaders(), ...init.headers },
        body: init.body,
        signal: AbortSignal.any(signals),
      });
    } catch (error) {
      throw unreachable(error);
    }

    if (response.status === 401) {
      throw new AuthError(`Authentication required for ${url}`, path);
    }
    if (response.status === 429) {
      throw new RateLimitError(
        `Rate limited for ${url} (too many failed auth attempts)`,
        path,
      );
    }
    if (!response.ok) {
      throw new ProtocolError(
        `API error ${response.status} for ${url}`,
        path,
        response.status,
      );
    }

    try {
      return { status: response.status, text: await response.text() };
    } catch (error) {
      throw unreachable(error);
    }
  }
}

/**
 * Interpret a console reply body. JSON passes through. Plain text that
 * reports a non-zero exit code becomes a CommandError whose message is the
 * output preceding the failure line, without the command echo.
 */
export function parseConsoleReply(command: string, text: string): ConsoleReply {
  const json = tryParseJson(text);
  if (json) {
    return { kind: 'json', command, body: json.value };
  }

  if (text.includes(COMMAND_FAILURE_MARKER)) {
    const messageLines: string[] = [];
    for (const line of text.trim().split('\n')) {
      if (line.includes(COMMAND_FAILURE_MARKER)) break;
      if (!line.startsWith(CONSOLE_ECHO_PREFIX)) {
        messageLines.push(line.trim());
      }
    }
    const message = messageLines.join(' ').trim() || 'Command failed';
    throw new CommandError(message, command);
  }

  return { kind: 'text', command, output: text.trim(), exitCode: 0 };
}

function tryParseJson(text: string): { value: unknown } | undefined {
  try {
    return { value: JSON.parse(text) };
  } catch {
    return undefined;
  }
}
