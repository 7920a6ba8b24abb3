/**
 * Filesystem error taxonomy and the single mapping step every tool's
 * failures go through.
 */

export type FsFailureKind = 'NotFound' | 'WrongKind' | 'IOFailure';

/** Raised by a tool's own kind checks (e.g. stat says "directory") */
export class FsToolError extends Error {
  readonly kind: FsFailureKind;

  constructor(kind: FsFailureKind, message: string) {
    super(message);
    this.kind = kind;
    this.name = 'FsToolError';
  }
}

/** Message prefixes a tool renders failures with; `<prefix>: <path|detail>` */
export interface FailureMessages {
  /** Rendered with the caller's path */
  notFound?: string;
  /** Rendered with the caller's path */
  wrongKind?: string;
  /** Rendered with the OS error detail */
  ioFailure: string;
}

export interface FsFailure {
  kind: FsFailureKind;
  message: string;
}

export function errnoCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) return undefined;
  return typeof err.code === 'string' ? err.code : undefined;
}

export function classifyFsError(err: unknown): FsFailureKind {
  if (err instanceof FsToolError) return err.kind;

  switch (errnoCode(err)) {
    case 'ENOENT':
      return 'NotFound';
    case 'EISDIR':
      return 'WrongKind';
    default:
      return 'IOFailure';
  }
}

/**
 * Render a thrown error as the stable message for one tool. A kind the
 * tool has no message for degrades to IOFailure.
 */
export function describeFsFailure(
  err: unknown,
  targetPath: string,
  messages: FailureMessages,
): FsFailure {
  const kind = classifyFsError(err);

  if (kind === 'NotFound' && messages.notFound) {
    return { kind, message: `${messages.notFound}: ${targetPath}` };
  }
  if (kind === 'WrongKind' && messages.wrongKind) {
    return { kind, message: `${messages.wrongKind}: ${targetPath}` };
  }

  const detail = err instanceof Error ? err.message : String(err);
  return { kind: 'IOFailure', message: `${messages.ioFailure}: ${detail}` };
}
