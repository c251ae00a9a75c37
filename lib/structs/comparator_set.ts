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

// A read-only, ordered set whose membership test uses a three-way compare
// instead of identity. Two items comparing as TIE are the same member, even
// when they are different objects.
//
// The items handed to the constructor must already be strictly ascending
// under |compareFn|; the set keeps them as given and never re-sorts.
export class ComparatorSet<T> implements Iterable<T> {
  private readonly items: T[];

  constructor(
    items: T[],
    private readonly compareFn: (lhs: T, rhs: T) => Favor
  ) {
    this.items = items;
  }

  get size(): number {
    return this.items.length;
  }

  has(item: T): boolean {
    return this.indexOf(item) !== -1;
  }

  // Returns the position of a member comparing equal to |item|, or -1.
  indexOf(item: T): number {
    // Binary search.
    let left = 0;
    let right = this.items.length;
    while (left < right) {
      const middle = (left + right) >> 1;
      if (this.compareFn(this.items[middle], item) === Favor.RHS) {
        left = middle + 1;
      } else {
        right = middle;
      }
    }
    return left < this.items.length &&
      this.compareFn(this.items[left], item) === Favor.TIE
      ? left
      : -1;
  }

  toArray(): T[] {
    return this.items.slice();
  }

  forEach(fn: (item: T, index: number) => void): void {
    this.items.forEach(fn);
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]();
  }
}
