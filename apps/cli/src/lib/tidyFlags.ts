import { NO_TIDY_CHOICES, type TidyChoices } from '@reelkeeper/operations';

export interface TidyFlag {
  key: keyof TidyChoices;
  flag: string;
  description: string;
}

export const TIDY_FLAGS: readonly TidyFlag[] = [
  { key: 'corrupt', flag: '--corrupt', description: 'Check video files for corruption' },
  { key: 'deleteCorrupt', flag: '--delete-corrupt', description: 'Delete video files that look corrupt' },
  { key: 'exist', flag: '--exist', description: 'Match downloaded flags to the files present' },
  { key: 'deleteVideo', flag: '--delete-video', description: 'Delete all video files' },
  { key: 'deleteOthers', flag: '--delete-others', description: 'With --delete-video, also delete leftover audio and fragments' },
  { key: 'deleteArchive', flag: '--delete-archive', description: 'Delete download archive files' },
  { key: 'moveThumb', flag: '--move-thumb', description: 'Move thumbnails into the thumbnail sub-directory' },
  { key: 'deleteThumb', flag: '--delete-thumb', description: 'Delete thumbnails' },
  { key: 'convertWebp', flag: '--convert-webp', description: 'Convert WebP thumbnails to JPEG' },
  { key: 'moveData', flag: '--move-data', description: 'Move metadata files into the metadata sub-directory' },
  { key: 'deleteDescription', flag: '--delete-description', description: 'Delete description files' },
  { key: 'deleteJson', flag: '--delete-json', description: 'Delete metadata (JSON) files' },
  { key: 'deleteXml', flag: '--delete-xml', description: 'Delete annotation files' },
];

/**
 * Tidy choices from parsed command options; unset flags are off
 */
export function tidyChoicesFromFlags(options: Partial<Record<keyof TidyChoices, boolean>>): TidyChoices {
  const choices: TidyChoices = { ...NO_TIDY_CHOICES };
  for (const { key } of TIDY_FLAGS) {
    choices[key] = options[key] === true;
  }
  return choices;
}

export function anyTidyChoice(choices: TidyChoices): boolean {
  return TIDY_FLAGS.some(({ key }) => choices[key]);
}
