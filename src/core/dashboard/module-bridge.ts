import { io } from 'socket.io-client';
import { z } from 'zod';

import type { EnvironmentSettings, Logger } from '../../types/index.js';
import { BRIDGE_EVENTS, DASHBOARD_NAME, type BridgeEvent } from '../../constants/index.js';
import type { OutputPort } from '../ports/output.js';
import { consoleOutput } from '../ports/console-output.js';
import { logger as defaultLogger } from '../../utils/logger.js';

/**
 * The part of a socket.io client the bridge talks to.
 */
export interface BridgeSocket {
  on(event: string, listener: (...args: unknown[]) => void): void;
  emit(event: string, payload: unknown): void;
  disconnect(): void;
}

export type BridgeSocketFactory = (url: string, timeoutMs: number) => BridgeSocket;

export const connectSocketIo: BridgeSocketFactory = (url, timeoutMs) => {
  const socket = io(url, { reconnection: false, timeout: timeoutMs });
  return {
    on: (event, listener) => {
      socket.on(event, listener);
    },
    emit: (event, payload) => {
      socket.emit(event, payload);
    },
    disconnect: () => {
      socket.disconnect();
    }
  };
};

const activeModuleSchema = z.object({ name: z.string(), hidden: z.boolean() }).passthrough();
const activeModulesSchema = z.array(activeModuleSchema);
const toggleResultSchema = z.object({ fails: z.array(z.string()).default([]) }).passthrough();

export interface ActiveModule {
  name: string;
  hidden: boolean;
}

export interface ToggleResult {
  fails: string[];
}

/**
 * Request/response channel to the mmpm companion module running inside the
 * dashboard. Every request opens a connection, emits one event, waits for
 * the matching reply and disconnects. Failures resolve to null.
 */
export class ModuleBridge {
  private readonly url: string;

  constructor(
    settings: Pick<EnvironmentSettings, 'uri' | 'bridgeNamespace' | 'bridgeTimeoutMs'>,
    private readonly output: OutputPort = consoleOutput,
    private readonly connect: BridgeSocketFactory = connectSocketIo,
    private readonly logger: Logger = defaultLogger,
    private readonly timeoutMs: number = settings.bridgeTimeoutMs
  ) {
    this.url = `${settings.uri.replace(/\/+$/, '')}${settings.bridgeNamespace}`;
  }

  async getActiveModules(): Promise<ActiveModule[] | null> {
    const data = await this.request(BRIDGE_EVENTS.GET_ACTIVE_MODULES, null, BRIDGE_EVENTS.ACTIVE_MODULES);
    if (data === null) {
      return null;
    }

    const parsed = activeModulesSchema.safeParse(data);
    if (!parsed.success) {
      this.output.error(`No usable data was received from the ${DASHBOARD_NAME} websocket`);
      return null;
    }

    // replies are occasionally delivered twice
    const unique: ActiveModule[] = [];
    for (const module of parsed.data) {
      if (!unique.some(seen => seen.name === module.name && seen.hidden === module.hidden)) {
        unique.push({ name: module.name, hidden: module.hidden });
      }
    }
    return unique;
  }

  hideModules(names: string[]): Promise<ToggleResult | null> {
    return this.toggle(BRIDGE_EVENTS.HIDE_MODULES, names, BRIDGE_EVENTS.MODULES_HIDDEN);
  }

  showModules(names: string[]): Promise<ToggleResult | null> {
    return this.toggle(BRIDGE_EVENTS.SHOW_MODULES, names, BRIDGE_EVENTS.MODULES_SHOWN);
  }

  private async toggle(event: BridgeEvent, names: string[], reply: BridgeEvent): Promise<ToggleResult | null> {
    const data = await this.request(event, names, reply);
    if (data === null) {
      return null;
    }
    const parsed = toggleResultSchema.safeParse(data);
    if (!parsed.success) {
      this.output.error('Unable to find provided module');
      return null;
    }
    return { fails: [...new Set(parsed.data.fails)] };
  }

  private request(event: BridgeEvent, payload: unknown, reply: BridgeEvent): Promise<unknown> {
    return new Promise(resolve => {
      this.logger.info(`Connecting to ${this.url}`);
      const socket = this.connect(this.url, this.timeoutMs);
      let settled = false;

      const finish = (value: unknown): void => {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        socket.disconnect();
        resolve(value);
      };

      const timer = setTimeout(() => {
        this.output.error(`Timed out waiting for ${reply} from ${this.url}`);
        finish(null);
      }, this.timeoutMs);

      socket.on('connect', () => {
        this.logger.info(`Connected; emitting ${event}`);
        socket.emit(event, payload);
      });
      socket.on('connect_error', (error) => {
        this.logger.debug('Websocket connection failed', error);
        this.output.error(
          `Failed to connect to the ${DASHBOARD_NAME} websocket at ${this.url}. Is the magicmirrorUri setting correct?`
        );
        finish(null);
      });
      socket.on(reply, (data) => {
        this.logger.info(`Received ${reply}`);
        finish(data ?? null);
      });
    });
  }
}
