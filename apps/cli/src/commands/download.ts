/**
 * Download Command
 *
 * Checks every channel and playlist (or just the given entities) for new
 * videos.
 */

import { NotFoundError, type MediaEntity } from '@reelkeeper/core';
import { DownloadManager } from '@reelkeeper/operations';
import { parseOptionString } from '@reelkeeper/utils';
import { openSession, parseDbids } from '../config/index.js';
import { runOperation, type GlobalOptions } from '../lib/runOperation.js';

interface DownloadCommandOptions {
  args?: string;
}

export async function downloadCommand(
  ids: string[],
  options: DownloadCommandOptions,
  globals: GlobalOptions
): Promise<void> {
  const session = await openSession();

  let targets: MediaEntity[] | undefined;
  if (ids.length > 0) {
    targets = parseDbids(ids).map(dbid => {
      const entity = session.registry.get(dbid);
      if (!entity) throw new NotFoundError('Entity', String(dbid));
      return entity;
    });
  }

  const extraArgs = parseOptionString(options.args ?? '');
  await runOperation(session, context => new DownloadManager(context, targets, { extraArgs }), globals);
}
