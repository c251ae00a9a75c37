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
import {Logger, MapOptions} from './map_options';

export class DefaultOptions implements MapOptions {
  readonly debugMode: boolean;
  readonly logger: Logger;

  constructor() {
    this.debugMode = false;
    this.logger = console;
  }

  errorMessage(code: number): string {
    return code.toString();
  }
}

// @export
export class options {
  static set(opt?: Partial<MapOptions>): void {
    const defaults = new DefaultOptions();
    const given = opt || {};
    const resolved: MapOptions = {
      debugMode:
        typeof given.debugMode === 'boolean'
          ? given.debugMode
          : defaults.debugMode,
      logger: isLogger(given.logger) ? given.logger : defaults.logger,
      errorMessage:
        typeof given.errorMessage === 'function'
          ? given.errorMessage.bind(given)
          : (code: number) => code.toString(),
    };
    Global.get().setOptions(resolved);
  }
}

function isLogger(logger: Logger | undefined): logger is Logger {
  return (
    logger !== undefined &&
    logger !== null &&
    typeof logger.log === 'function' &&
    typeof logger.warn === 'function' &&
    typeof logger.error === 'function'
  );
}
