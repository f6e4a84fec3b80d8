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

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogSink = (level: LogLevel, message: string) => void;

const consoleSink: LogSink = (level, message) => {
  switch (level) {
    case 'error':
      console.error(message);
      break;
    case 'warn':
      console.warn(message);
      break;
    default:
      console.log(message);
  }
};

/**
 * Operator-facing output. Progress lines go through `info`, skips through
 * `warn`; `debug` lines only show with `--debug`.
 */
export class AppLogger {
  private static sink: LogSink = consoleSink;
  private static debugEnabled = false;

  /** Replaces the output sink; call without arguments to restore the console. */
  static setSink(sink?: LogSink) {
    AppLogger.sink = sink ?? consoleSink;
  }

  static setDebug(enabled: boolean) {
    AppLogger.debugEnabled = enabled;
  }

  static debug(message: string) {
    if (AppLogger.debugEnabled) {
      AppLogger.sink('debug', message);
    }
  }

  static info(message = '') {
    AppLogger.sink('info', message);
  }

  static warn(message: string) {
    AppLogger.sink('warn', message);
  }

  static error(message: string) {
    AppLogger.sink('error', message);
  }
}
