const C = {
  reset: "\x1b[0m",
  cyan: "\x1b[36m",
  green: "\x1b[32m",
  yellow: "\x1b[33m",
  red: "\x1b[31m",
  gray: "\x1b[90m",
} as const;

export const cyan = (s: string): string => `${C.cyan}${s}${C.reset}`;
export const green = (s: string): string => `${C.green}${s}${C.reset}`;
export const yellow = (s: string): string => `${C.yellow}${s}${C.reset}`;
export const red = (s: string): string => `${C.red}${s}${C.reset}`;
export const gray = (s: string): string => `${C.gray}${s}${C.reset}`;

export const formatDuration = (ms: number): string =>
  ms < 1000 ? `${ms}ms` : `${(ms / 1000).toFixed(1)}s`;
