/**
 * Tests for the OSC 52 clipboard writer
 */

import { describe, test, expect, afterEach, jest } from '@jest/globals';
import { PassThrough, Writable } from 'stream';
import { copyToClipboard, osc52Sequence } from '../copyToClipboard';

describe('copyToClipboard', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('osc52Sequence base64-encodes the payload', () => {
    expect(osc52Sequence('hi')).toBe('\u001b]52;c;aGk=\u0007');
  });

  test('writes the sequence to the output', async () => {
    const output = new PassThrough();
    const chunks: string[] = [];
    output.on('data', (chunk: Buffer) => chunks.push(chunk.toString('utf8')));
    const onSuccess = jest.fn();

    await expect(copyToClipboard('hi', { output, onSuccess })).resolves.toBe(true);
    await new Promise(resolve => setImmediate(resolve));
    expect(chunks.join('')).toBe('\u001b]52;c;aGk=\u0007');
    expect(onSuccess).toHaveBeenCalledTimes(1);
  });

  test('blank text is not copied', async () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    await expect(copyToClipboard('  \n', { output: new PassThrough() })).resolves.toBe(false);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  test('a failing output reports the error', async () => {
    jest.spyOn(console, 'error').mockImplementation(() => undefined);
    const output = new Writable({
      write(_chunk, _encoding, callback) {
        callback(new Error('closed'));
      },
    });
    output.on('error', () => undefined);
    const onError = jest.fn();

    await expect(copyToClipboard('hi', { output, onError })).resolves.toBe(false);
    expect(onError).toHaveBeenCalledTimes(1);
  });
});
