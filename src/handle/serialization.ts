import { z } from 'zod';
import { Backtrace, SerializedBacktrace } from '../backtrace/backtrace';
import { SerializationError } from '../errors/serialization-error';
import { RemoteError } from './remote-error';

const StackFrameSchema = z
  .object({
    fn: z.string().optional(),
    location: z.string().optional(),
  })
  .strict();

const SerializedLinkSchema = z
  .object({
    name: z.string(),
    display: z.string(),
    debug: z.string(),
  })
  .strict();

export const SerializedErrorBoxSchema = z
  .object({
    chain: z.array(SerializedLinkSchema).nonempty('Chain must contain the root error'),
    backtrace: z
      .object({
        status: z.enum(['captured', 'disabled', 'unsupported']),
        frames: z.array(StackFrameSchema),
      })
      .strict(),
  })
  .strict();

export type SerializedLink = z.infer<typeof SerializedLinkSchema>;

export interface SerializedErrorBox {
  chain: SerializedLink[];
  backtrace: SerializedBacktrace;
}

type ValidatedErrorBox = z.infer<typeof SerializedErrorBoxSchema>;

export function parseSerializedErrorBox(data: unknown): ValidatedErrorBox {
  const parsed = SerializedErrorBoxSchema.safeParse(data);
  if (!parsed.success) {
    throw new SerializationError('Invalid serialized error box', {
      context: {
        module: 'serialization',
        operation: 'fromJSON',
        data: { issues: parsed.error.issues.map((issue) => issue.message) },
      },
      cause: parsed.error,
    });
  }
  return parsed.data;
}

/**
 * Rebuild a serialized chain as nested RemoteError values, returning the root.
 */
export function restoreChain(data: ValidatedErrorBox): RemoteError {
  const [root, ...causes] = data.chain;

  let cause: RemoteError | undefined;
  for (const link of causes.reverse()) {
    cause = new RemoteError({ ...link, cause });
  }

  return new RemoteError({
    ...root,
    cause,
    backtrace: Backtrace.fromJSON(data.backtrace),
  });
}
