/**
 * Copyright 2024 Google LLC
 *
 * Licensed under the Apache License, Version 2.0 (the "License");
 * you may not use this file except in compliance with the License.
 * You may obtain a copy of the License at
 *
 *       https://www.apache.org/licenses/LICENSE-2.0
 *
 * Unless required by applicable law or agreed to in writing, software
 * distributed under the License is distributed on an "AS IS" BASIS,
 * WITHOUT WARRANTIES OR CONDITIONS OF ANY KIND, either express or implied.
 * See the License for the specific language governing permissions and
 * limitations under the License.
 */

import { AppLogger, type LogLevel } from '../logging.js';

export interface CapturedLine {
  level: LogLevel;
  message: string;
}

export interface LogCapture {
  lines: CapturedLine[];
  messages(level?: LogLevel): string[];
  restore(): void;
}

/** Routes AppLogger output into memory until `restore` is called. */
export function captureLogs(): LogCapture {
  const lines: CapturedLine[] = [];
  AppLogger.setSink((level, message) => lines.push({ level, message }));
  return {
    lines,
    messages: level =>
      lines
        .filter(line => level === undefined || line.level === level)
        .map(line => line.message),
    restore: () => {
      AppLogger.setSink();
      AppLogger.setDebug(false);
    },
  };
}
