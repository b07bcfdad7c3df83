/**
 * Refresh Command
 *
 * Matches the files on disk against the registry, for one container or
 * the whole archive.
 */

import { RefreshManager } from '@reelkeeper/operations';
import { openSession } from '../config/index.js';
import { resolveContainer, runOperation, type GlobalOptions } from '../lib/runOperation.js';

export async function refreshCommand(container: string | undefined, globals: GlobalOptions): Promise<void> {
  const session = await openSession();
  const scope = container === undefined ? undefined : resolveContainer(session.registry, container);

  await runOperation(session, context => new RefreshManager(context, { scope }), globals);
}
