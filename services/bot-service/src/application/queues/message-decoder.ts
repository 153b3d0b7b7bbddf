export interface MessageDecoder<TPayload> {
  readonly typeName: string;
  decode(content: Buffer): TPayload;
}

export class MessageDecodeError extends Error {
  constructor(
    readonly typeName: string,
    readonly reason: string,
  ) {
    super(`Cannot decode message body as ${typeName}: ${reason}`);
    this.name = 'MessageDecodeError';
  }
}

/**
 * Decodes a UTF-8 JSON body and narrows it with a type guard.
 */
export function jsonDecoder<TPayload>(
  typeName: string,
  guard: (value: unknown) => value is TPayload,
): MessageDecoder<TPayload> {
  return {
    typeName,
    decode(content: Buffer): TPayload {
      let parsed: unknown;

      try {
        parsed = JSON.parse(content.toString('utf-8'));
      } catch (error) {
        throw new MessageDecodeError(typeName, error instanceof Error ? error.message : 'invalid JSON');
      }

      if (!guard(parsed)) {
        throw new MessageDecodeError(typeName, 'payload does not match the expected shape');
      }

      return parsed;
    },
  };
}
