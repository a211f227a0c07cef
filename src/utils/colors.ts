export const RESET = '\x1b[0m';
export const BOLD = '\x1b[1m';
export const DIM = '\x1b[2m';

export const RED = '\x1b[31m';
export const YELLOW = '\x1b[33m';
export const CYAN = '\x1b[36m';

export function red(s: string): string { return RED + s + RESET; }
export function yellow(s: string): string { return YELLOW + s + RESET; }
export function cyan(s: string): string { return CYAN + s + RESET; }
export function bold(s: string): string { return BOLD + s + RESET; }
export function dim(s: string): string { return DIM + s + RESET; }
