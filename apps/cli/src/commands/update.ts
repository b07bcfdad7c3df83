/**
 * Update Command
 */

import { UpdateManager } from '@reelkeeper/operations';
import { openSession } from '../config/index.js';
import { runOperation, type GlobalOptions } from '../lib/runOperation.js';

export async function updateCommand(options: { ffmpeg?: boolean }, globals: GlobalOptions): Promise<void> {
  const session = await openSession();
  const target = options.ffmpeg ? 'ffmpeg' : 'downloader';

  await runOperation(session, context => new UpdateManager(context, target), globals);
}
