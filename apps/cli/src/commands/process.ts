/**
 * Process Command
 *
 * Sends videos through one FFmpeg recipe (a JSON file of options).
 */

import { ProcessManager } from '@reelkeeper/operations';
import { loadRecipe, openSession, parseDbids } from '../config/index.js';
import { printKeyValue } from '../lib/output.js';
import { runOperation, type GlobalOptions } from '../lib/runOperation.js';

interface ProcessCommandOptions {
  options?: string;
  clipFolder?: boolean;
}

export async function processCommand(
  ids: string[],
  options: ProcessCommandOptions,
  globals: GlobalOptions
): Promise<void> {
  const recipe = await loadRecipe(options.options);
  const session = await openSession();
  const videos = parseDbids(ids).map(dbid => session.registry.getVideo(dbid));

  if (!globals.json) {
    printKeyValue('Recipe', recipe.name);
    printKeyValue('Mode', `${recipe.inputMode} -> ${recipe.outputMode}`);
  }

  await runOperation(
    session,
    context => new ProcessManager(context, videos, recipe, { clipFolder: options.clipFolder === true }),
    globals
  );
}
