// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\u001B\[[0-9;]*m/g;

/**
 * Last rendered frame without colour codes.
 */
export function plainFrame(lastFrame: () => string | undefined): string {
  return (lastFrame() ?? '').replace(ANSI_PATTERN, '');
}

export const ARROW_DOWN = '\u001B[B';
