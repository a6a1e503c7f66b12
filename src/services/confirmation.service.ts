import type { ConfirmationGatePort } from './ports/confirmation.port';

export const ConfirmationToken = {
  /** Proceed with batch deletion. */
  Yes: 'YES',
  /** Proceed with retention-settings removal. */
  Remove: 'REMOVE',
  /** Proceed with an irreversible purge. */
  Delete: 'DELETE',
} as const;

export type ConfirmationToken = (typeof ConfirmationToken)[keyof typeof ConfirmationToken];

const KNOWN_TOKENS: readonly ConfirmationToken[] = Object.values(ConfirmationToken);

export function parseConfirmationToken(answer: string): ConfirmationToken | null {
  const trimmed = answer.trim();
  return KNOWN_TOKENS.find((token) => token === trimmed) ?? null;
}

/**
 * Case-sensitive exact match: "yes" does not satisfy "YES".
 * Surrounding whitespace is ignored.
 */
export function isConfirmed(answer: string, required: ConfirmationToken): boolean {
  return parseConfirmationToken(answer) === required;
}

export async function requestConfirmation(
  gate: ConfirmationGatePort,
  required: ConfirmationToken,
  message: string
): Promise<{ confirmed: boolean; answer: string }> {
  const answer = await gate.prompt(`${message}\nType ${required} to proceed`);
  return { confirmed: isConfirmed(answer, required), answer };
}
