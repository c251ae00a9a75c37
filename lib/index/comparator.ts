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

import {Favor} from '../base/private_enum';

export {Favor};

/**
 * Comparator used to order the keys of a map. It offers a method to indicate
 * which operand is "favorable". It must be a total, consistent ordering over
 * every key ever put into the map; keys comparing as TIE are the same key.
 */
export interface Comparator<K> {
  compare(lhs: K, rhs: K): Favor;
}

// Plain three-way compare function, as accepted by Array.prototype.sort.
export type CompareFn<K> = (lhs: K, rhs: K) => number;
