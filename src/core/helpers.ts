// SPDX-License-Identifier: Apache-2.0

export function sleep(milliseconds: number): Promise<void> {
  return new Promise<void>(resolve => {
    setTimeout(resolve, milliseconds);
  });
}

/**
 * Split flag values given as `a,b` or `a b`, dropping empty items.
 */
export function splitFlagInput(input: string, separator = ','): string[] {
  return input
    .split(separator)
    .map(s => s.trim())
    .filter(Boolean);
}
