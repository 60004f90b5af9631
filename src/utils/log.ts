// log.ts
export type Logger = Pick<Console, 'log' | 'warn'>;

export const silentLogger: Logger = {
  log: () => {},
  warn: () => {},
};

export function formatCount(n: number): string {
  return n.toLocaleString('en-US');
}
