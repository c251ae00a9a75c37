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

// @export
export enum Order {
  DESC = 0,
  ASC = 1,
}

// @export
export enum ErrorCode {
  // System level errors
  SYSTEM_ERROR = 0,

  // Configuration errors
  INVALID_ORDER = 100,
  INVALID_COMPARATOR = 101,

  // Data errors
  KEY_NOT_FOUND = 200,
  EMPTY_TREE = 201,

  // Unsupported
  NOT_SUPPORTED = 300,

  // Test errors
  ASSERTION = 998,
  SIMULATED_ERROR = 999,
}  // enum ErrorCode
