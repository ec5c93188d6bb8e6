import { InvalidInputError } from './errors';
import { Classification } from './types';

// The operator ends the first token, or is the whole second token after a single space.
const INCREMENT_REGEX = /^\S+?\s?\+\+(?=\s|$)/;
const DECREMENT_REGEX = /^\S+?\s?--(?=\s|$)/;

const URL_REGEX = /https?:\/\/[a-z0-9-]+(?:\.[a-z0-9-]+)+(?::\d+)?(?:[/?#][^\s<>|]*)?/i;

function firstToken(text: string): string {
  return text.trim().split(/\s+/)[0];
}

/**
 * Decide whether a message is a karma operation. Only the start of the message is inspected;
 * whatever follows the operator is flavor text.
 */
export function classify(text: string): Classification {
  if (INCREMENT_REGEX.test(text)) return 'increment';
  if (DECREMENT_REGEX.test(text)) return 'decrement';
  return 'none';
}

/**
 * Pull the subject out of a karma message: `@ada++ for the fix` gives `ada`.
 *
 * @throws InvalidInputError when there is no token, or nothing is left once the operator and
 * a leading `#`/`@` are removed.
 */
export function extractSubject(text: string): string {
  let subject = firstToken(text);
  if (!subject) {
    throw new InvalidInputError('Message has no subject token');
  }

  if (subject.endsWith('++') || subject.endsWith('--')) {
    subject = subject.slice(0, -2);
  }
  if (subject.startsWith('#') || subject.startsWith('@')) {
    subject = subject.slice(1);
  }

  if (!subject) {
    throw new InvalidInputError(`No subject left in "${text}"`);
  }
  return subject;
}

/**
 * True when the sender's ID appears anywhere in the text.
 *
 * This is a substring test, not a mention comparison: an ID that happens to be part of an
 * unrelated token also counts.
 */
export function isSelfReference(userId: string, text: string): boolean {
  return text.includes(userId);
}

/**
 * True when a `--` in the message sits inside a URL rather than acting as an operator.
 * Only meaningful for decrements; `++` cannot appear unencoded in a URL.
 */
export function looksLikeUrlFalsePositive(text: string): boolean {
  return text
    .split(/\s+/)
    .some((token) => token.includes('--') && URL_REGEX.test(token));
}
