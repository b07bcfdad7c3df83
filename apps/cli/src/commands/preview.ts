/**
 * Preview Command
 *
 * Prints the FFmpeg command a recipe compiles to, using placeholder file
 * names. Touches neither the registry nor the disk.
 */

import { loadConfig } from '@reelkeeper/core';
import { compileCommand, formatCommand, specimenInput } from '@reelkeeper/processing';
import { loadRecipe } from '../config/index.js';
import { printJson, printWarning } from '../lib/output.js';
import type { GlobalOptions } from '../lib/runOperation.js';

export async function previewCommand(options: { options?: string }, globals: GlobalOptions): Promise<void> {
  const config = loadConfig();
  const recipe = await loadRecipe(options.options);
  const command = compileCommand(
    recipe,
    specimenInput(config.binaries.ffmpeg.resolvedPath),
    undefined,
    config.splitVideoGenericTitle
  );

  if (command === null) {
    printWarning(`Recipe '${recipe.name}' has nothing to convert`);
    return;
  }

  if (globals.json) {
    printJson({ argv: command.argv, destPath: command.destPath });
  } else {
    console.log(formatCommand(command.argv));
  }
}
