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

// The comparison result constant. This must be consistent with the constant
// required by the sort function of Array.prototype.sort.
export enum Favor {
  RHS = -1,  // favors right hand side, i.e. lhs < rhs
  TIE = 0,   // no favorite, i.e. lhs == rhs
  LHS = 1,   // favors left hand side, i.e. lhs > rhs
}
