/**
 * Ways a game can end, as reported in the server's game status field.
 */

export const Termination = {
  Checkmate: 'mate',
  TimeForfeit: 'outoftime',
  Resignation: 'resign',
  Abort: 'aborted',
  Draw: 'draw',
} as const;

export type Termination = (typeof Termination)[keyof typeof Termination];

const TERMINATIONS: readonly string[] = Object.values(Termination);

export function isTermination(value: unknown): value is Termination {
  return typeof value === 'string' && TERMINATIONS.includes(value);
}
