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

// A detached copy of one key-value pair. Mappings change only through
// BPlusTreeMap.put(); setValue() updates this copy and leaves the map alone.
export class MapEntry<K, V> {
  constructor(readonly key: K, public value: V) {}

  getKey(): K {
    return this.key;
  }

  getValue(): V {
    return this.value;
  }

  // Returns the new value.
  setValue(value: V): V {
    this.value = value;
    return this.value;
  }

  toString(): string {
    return `{${this.key}: ${this.value}}`;
  }
}
