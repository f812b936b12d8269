/**
 * Message Validation Module
 *
 * Messages are forwarded to an external interpreter as a command-line
 * argument. Only a narrow character class is accepted so the message cannot
 * carry shell metacharacters, quotes or argument separators.
 */

/**
 * Characters a message may contain: letters, digits, whitespace,
 * period, comma, hyphen and underscore.
 */
export const ALLOWED_MESSAGE_PATTERN = /^[a-zA-Z0-9\s.,\-_]+$/;

const ALLOWED_CHARACTER = /[a-zA-Z0-9\s.,\-_]/;

/**
 * Base class for every message validation failure.
 */
export class MessageValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MessageValidationError';
  }
}

/**
 * Thrown when the message is missing, empty or whitespace only.
 */
export class EmptyMessageError extends MessageValidationError {
  constructor() {
    super('Message must not be empty or whitespace only');
    this.name = 'EmptyMessageError';
  }
}

/**
 * Thrown when the message contains characters outside the allowed class.
 */
export class InvalidMessageCharactersError extends MessageValidationError {
  readonly invalidCharacters: string[];

  constructor(invalidCharacters: string[]) {
    const listed = invalidCharacters.map((char) => JSON.stringify(char)).join(', ');
    super(`Message contains invalid characters: ${listed}`);
    this.name = 'InvalidMessageCharactersError';
    this.invalidCharacters = invalidCharacters;
  }
}

/**
 * Returns each distinct disallowed character, in order of first occurrence.
 */
export function findInvalidCharacters(message: string): string[] {
  const seen = new Set<string>();

  // Iterate by code point so surrogate pairs are reported whole
  for (const char of message) {
    if (!ALLOWED_CHARACTER.test(char)) {
      seen.add(char);
    }
  }

  return Array.from(seen);
}

/**
 * Validates a message and returns it unchanged.
 *
 * @throws EmptyMessageError when the message is missing or blank
 * @throws InvalidMessageCharactersError when any character falls outside the allowed class
 */
export function validateMessage(message: string | null | undefined): string {
  if (message === null || message === undefined || message.trim() === '') {
    throw new EmptyMessageError();
  }

  if (!ALLOWED_MESSAGE_PATTERN.test(message)) {
    throw new InvalidMessageCharactersError(findInvalidCharacters(message));
  }

  return message;
}
