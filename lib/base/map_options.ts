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

// Console-compatible sink for log lines.
export interface Logger {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

// Configuration class that replaces flags.
// This allows users to customize the library without compilation.
export interface MapOptions {
  // This controls whether built-in invariant checks and structural log lines
  // are enabled or not.
  debugMode: boolean;

  // Receives the lines produced by LogWriter. Default is the console.
  logger: Logger;

  // This translates error code into meaningful strings.
  // Default is to stringify the code itself.
  // See testing/debug_options.ts for in-program translation.
  errorMessage(code: number): string;
}
