/**
 * Copy-to-clipboard for terminal sessions
 *
 * Uses the OSC 52 escape sequence: the terminal emulator (also over SSH and inside tmux
 * with `set-clipboard on`) places the payload on the system clipboard.
 */

export interface CopyOptions {
  /**
   * Function to call on successful copy
   */
  onSuccess?: () => void;

  /**
   * Function to call on copy failure
   */
  onError?: (error: unknown) => void;

  /** Where the escape sequence is written (default: process.stdout) */
  output?: NodeJS.WritableStream;
}

export function osc52Sequence(text: string): string {
  const payload = Buffer.from(text, 'utf8').toString('base64');
  return `\u001b]52;c;${payload}\u0007`;
}

/**
 * Copy text to the clipboard
 * Returns true if the sequence was written, false otherwise
 */
export async function copyToClipboard(text: string, options: CopyOptions = {}): Promise<boolean> {
  const { onSuccess, onError, output = process.stdout } = options;

  if (text.trim().length === 0) {
    console.warn('[copyToClipboard] No text provided to copy');
    return false;
  }

  try {
    await new Promise<void>((resolve, reject) => {
      output.write(osc52Sequence(text), error => (error ? reject(error) : resolve()));
    });
    onSuccess?.();
    return true;
  } catch (error) {
    console.error('[copyToClipboard] Copy operation failed:', error);
    onError?.(error);
    return false;
  }
}
