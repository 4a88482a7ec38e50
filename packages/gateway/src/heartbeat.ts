/**
 * CommandHeartbeat - Drives the gateway's liveness LED through an external command
 *
 * `<command> 1` turns the LED on, `<command> 0` turns it off. A failing command
 * is logged and otherwise ignored.
 */

import { spawn } from 'child_process';
import { createLogger } from '@ledbridge/types';
import type { Logger } from '@ledbridge/types';
import { DEFAULT_HEARTBEAT_COMMAND } from './config.js';

export interface HeartbeatIndicator {
  set(on: boolean): Promise<void>;
}

export class CommandHeartbeat implements HeartbeatIndicator {
  private readonly command: string;
  private readonly log: Logger;

  constructor(command: string = DEFAULT_HEARTBEAT_COMMAND, logger?: Logger) {
    this.command = command;
    this.log = logger ?? createLogger('Heartbeat');
  }

  set(on: boolean): Promise<void> {
    return new Promise((resolve) => {
      let settled = false;
      const finish = (failure?: string) => {
        if (settled) return;
        settled = true;
        if (failure) {
          this.log.warn(`Setting heartbeat led failed: ${failure}`);
        }
        resolve();
      };

      const child = spawn(this.command, [on ? '1' : '0'], { stdio: 'ignore' });
      child.on('error', (error: Error) => finish(error.message));
      child.on('exit', (code: number | null, signal: NodeJS.Signals | null) => {
        if (code === 0) {
          finish();
        } else {
          finish(code === null ? `killed by ${signal}` : `exit code ${code}`);
        }
      });
    });
  }
}
