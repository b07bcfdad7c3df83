/**
 * Tidy Command
 */

import { FFmpegCorruptionProbe, TidyManager, type TidyChoices } from '@reelkeeper/operations';
import { openSession } from '../config/index.js';
import { printError } from '../lib/output.js';
import { resolveContainer, runOperation, type GlobalOptions } from '../lib/runOperation.js';
import { anyTidyChoice, tidyChoicesFromFlags } from '../lib/tidyFlags.js';

export type TidyCommandOptions = Partial<Record<keyof TidyChoices, boolean>>;

export async function tidyCommand(
  container: string | undefined,
  options: TidyCommandOptions,
  globals: GlobalOptions
): Promise<void> {
  const choices = tidyChoicesFromFlags(options);
  if (!anyTidyChoice(choices)) {
    printError('Choose at least one check (see reelkeeper tidy --help)');
    process.exit(1);
  }

  const session = await openSession();
  const scope = container === undefined ? undefined : resolveContainer(session.registry, container);
  const probe = new FFmpegCorruptionProbe(
    session.config.binaries.ffmpeg.resolvedPath,
    session.config.probeTimeoutMs
  );

  await runOperation(session, context => new TidyManager(context, choices, { scope, probe }), globals);
}
