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

import {ErrorCode} from './enum';
import {Exception} from './exception';

// Throws ASSERTION when the condition does not hold. Callers decide whether the
// check is worth running, usually by looking at the debugMode option.
export function assert(
  condition: boolean,
  message = 'assertion failed'
): asserts condition {
  if (!condition) {
    throw new Exception(ErrorCode.ASSERTION, message);
  }
}
