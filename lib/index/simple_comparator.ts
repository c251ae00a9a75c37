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

import {Order} from '../base/enum';
import {Favor} from '../base/private_enum';
import {Comparator} from './comparator';

export type SingleKey = string | number;

// Natural ordering of numbers and strings.
export class SimpleComparator implements Comparator<SingleKey> {
  static compareAscending(lhs: SingleKey, rhs: SingleKey): Favor {
    return lhs > rhs ? Favor.LHS : lhs < rhs ? Favor.RHS : Favor.TIE;
  }

  static compareDescending(lhs: SingleKey, rhs: SingleKey): Favor {
    return SimpleComparator.compareAscending(rhs, lhs);
  }

  protected compareFn: (lhs: SingleKey, rhs: SingleKey) => Favor;

  constructor(order: Order = Order.ASC) {
    this.compareFn =
      order === Order.DESC
        ? SimpleComparator.compareDescending
        : SimpleComparator.compareAscending;
  }

  compare(lhs: SingleKey, rhs: SingleKey): Favor {
    return this.compareFn(lhs, rhs);
  }

  toString(): string {
    return this.compareFn === SimpleComparator.compareDescending
      ? 'SimpleComparator_DESC'
      : 'SimpleComparator_ASC';
  }
}
