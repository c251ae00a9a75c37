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
import {CompareFn, Comparator} from './comparator';

// Adapts a sort-style compare function. Only the sign of its result matters;
// NaN is read as a tie, the same way Array.prototype.sort reads it.
export class FunctionComparator<K> implements Comparator<K> {
  constructor(private readonly fn: CompareFn<K>) {}

  compare(lhs: K, rhs: K): Favor {
    const result = this.fn(lhs, rhs);
    return result > 0 ? Favor.LHS : result < 0 ? Favor.RHS : Favor.TIE;
  }
}

export function toComparator<K>(
  comparator: Comparator<K> | CompareFn<K>
): Comparator<K> {
  return typeof comparator === 'function'
    ? new FunctionComparator(comparator)
    : comparator;
}
