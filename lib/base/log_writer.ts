/**
 * Copyright 2018 The Lovefield Project Authors. All Rights Reserved.
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *     http://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

import {Global} from './global';
import {Logger} from './map_options';

export interface LoggerContext {
  operation?: string;
  order?: number;
  height?: number;
  size?: number;
  nodeId?: number;
}

const CONTEXT_KEYS: Array<keyof LoggerContext> = [
  'operation',
  'order',
  'height',
  'size',
  'nodeId',
];

// Writes "message. key: value, key: value" lines to the configured logger.
// log() lines are structural chatter and are dropped unless debugMode is on.
export class LogWriter {
  constructor(private readonly loggerOverride?: Logger) {}

  log(message: string, context?: LoggerContext): void {
    if (!Global.get().getOptions().debugMode) {
      return;
    }
    this.logger().log(this.computeMessageToWrite(message, context));
  }

  warn(message: string, context?: LoggerContext): void {
    this.logger().warn(this.computeMessageToWrite(message, context));
  }

  error(message: string, context?: LoggerContext): void {
    this.logger().error(this.computeMessageToWrite(message, context));
  }

  // Resolved on every call so that options.set() takes effect on live maps.
  private logger(): Logger {
    return this.loggerOverride || Global.get().getOptions().logger;
  }

  private computeMessageToWrite(
    message: string,
    context?: LoggerContext
  ): string {
    const contextMessages: string[] = [];
    if (context) {
      for (const key of CONTEXT_KEYS) {
        const value = context[key];
        if (value === undefined) {
          continue;
        }
        contextMessages.push(`${key}: ${value}`);
      }
    }
    if (!contextMessages.length) {
      return message;
    }
    return `${message}. ${contextMessages.join(', ')}`;
  }
}
