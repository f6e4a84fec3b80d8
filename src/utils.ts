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

export class RetryUtil {
  /**
   * Runs `fn` up to `maxAttempts` times, sleeping `delayMillis` between
   * attempts. Errors for which `shouldRetry` returns false are rethrown
   * immediately.
   */
  static async executeWithRetry<T>(
    fn: () => Promise<T>,
    maxAttempts = 1,
    delayMillis = 0,
    shouldRetry: (err: unknown) => boolean = () => true
  ): Promise<T> {
    let attempt = 0;
    let error: unknown = null;

    while (attempt < Math.max(1, maxAttempts)) {
      try {
        return await fn();
      } catch (err) {
        error = err;
        attempt++;
        if (!shouldRetry(err)) {
          break;
        }
        if (delayMillis && attempt < maxAttempts) {
          await TimeUtil.sleep(delayMillis);
        }
      }
    }
    throw error;
  }
}

export class TimeUtil {
  /** Local time as YYYYMMDD_HHMMSS, used in report file names. */
  static fileTimestamp(date: Date = new Date()): string {
    const pad = (value: number) => String(value).padStart(2, '0');
    return (
      `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
      `_${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
    );
  }

  static sleep(millis: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, millis));
  }
}

export class StringUtil {
  /** Splits command output into trimmed, non-empty lines. */
  static lines(output: string): string[] {
    return output
      .split(/\r?\n/)
      .map(line => line.trim())
      .filter(line => line.length > 0);
  }

  /** Last segment of a slash-separated resource name. */
  static basename(resourceName: string): string {
    const segments = resourceName.split('/').filter(Boolean);
    return segments.length ? segments[segments.length - 1] : '';
  }

  static splitList(value: string): string[] {
    return value
      .split(',')
      .map(entry => entry.trim())
      .filter(entry => entry.length > 0);
  }
}
