/**
 * Copyright 2016 The Lovefield Project Authors. All Rights Reserved.
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

import {MapOptions} from './map_options';
import {DefaultOptions} from './options';

// Process-wide holder of the active options. Maps never keep tree state here.
export class Global {
  static get(): Global {
    if (!Global.instance) {
      Global.instance = new Global();
    }
    return Global.instance;
  }
  private static instance: Global | undefined;

  private opt: MapOptions | null;

  constructor() {
    this.opt = null;
  }

  getOptions(): MapOptions {
    if (this.opt === null) {
      this.opt = new DefaultOptions();
    }
    return this.opt;
  }

  setOptions(options: MapOptions): void {
    this.opt = options;
  }
}
