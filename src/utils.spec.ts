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

import { describe, expect, it, vi } from 'vitest';

import { RetryUtil, StringUtil, TimeUtil } from './utils.js';

describe('TimeUtil', () => {
  it('formats file timestamps in local time', () => {
    expect(TimeUtil.fileTimestamp(new Date(2024, 0, 5, 9, 3, 7))).toBe(
      '20240105_090307'
    );
    expect(TimeUtil.fileTimestamp(new Date(2023, 11, 31, 23, 59, 58))).toBe(
      '20231231_235958'
    );
  });
});

describe('StringUtil', () => {
  it('splits output into trimmed non-empty lines', () => {
    expect(StringUtil.lines('gs://a/\r\n\n  gs://b/  \n')).toEqual([
      'gs://a/',
      'gs://b/',
    ]);
    expect(StringUtil.lines('')).toEqual([]);
  });

  it('takes the last segment of a resource name', () => {
    expect(
      StringUtil.basename('//cloudresourcemanager.googleapis.com/projects/p1')
    ).toBe('p1');
    expect(StringUtil.basename('p2')).toBe('p2');
    expect(StringUtil.basename('')).toBe('');
  });

  it('splits comma-separated lists', () => {
    expect(StringUtil.splitList(' a, ,b ')).toEqual(['a', 'b']);
  });
});

describe('RetryUtil', () => {
  it('retries until the call succeeds', async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'))
      .mockResolvedValue('done');

    await expect(RetryUtil.executeWithRetry(fn, 3)).resolves.toBe('done');
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('rethrows the last error once attempts are used up', async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new Error('first'))
      .mockRejectedValueOnce(new Error('second'));

    await expect(RetryUtil.executeWithRetry(fn, 2)).rejects.toThrow('second');
    expect(fn).toHaveBeenCalledTimes(2);
  });

  it('stops at errors that must not be retried', async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValue(new Error('denied'));

    await expect(
      RetryUtil.executeWithRetry(fn, 5, 0, () => false)
    ).rejects.toThrow('denied');
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
