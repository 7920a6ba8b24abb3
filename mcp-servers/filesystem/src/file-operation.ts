import * as path from 'path';

import type { MCPResult, ToolContext } from '../../_shared/ts/mcp-base';
import { fail, ok } from '../../_shared/ts/mcp-base';
import { describeFsFailure } from './errors';
import type { FailureMessages } from './errors';

/** Resolve a caller-supplied path against the context's working directory */
export function resolvePath(context: ToolContext, target: string): string {
  return path.resolve(context.cwd, target);
}

/**
 * Run one filesystem operation for a tool.
 *
 * Anything `operation` throws becomes `{ success: false }` with the tool's
 * stable message; nothing escapes to the dispatcher.
 */
export async function runFileOperation<T>(
  context: ToolContext,
  tool: string,
  target: string,
  messages: FailureMessages,
  operation: (resolved: string) => Promise<T>,
): Promise<MCPResult<T>> {
  const log = context.logger.child(tool);
  log.info(`called with path '${target}'`);

  try {
    const data = await operation(resolvePath(context, target));
    log.info(`completed on '${target}'`);
    return ok(data);
  } catch (err) {
    const failure = describeFsFailure(err, target, messages);
    log.error({ kind: failure.kind }, failure.message);
    return fail(failure.message);
  }
}
