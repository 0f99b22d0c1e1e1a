import fs from 'fs';
import path from 'path';

const MAX_EXCERPT_LENGTH = 8000;
const SECTION_SIZE = 2000;
const SECTION_COUNT = 4;

export const DEFAULT_NOTES_DIR = path.join(process.cwd(), 'data', 'notes');

/**
 * Pick reference material for a category from `{notesDir}/{category}.txt`.
 *
 * Small files are used whole. Larger ones contribute four random
 * 2000-character sections, so successive questions do not all draw on the
 * opening paragraphs. Returns undefined when there is no notes file.
 */
export function selectReferenceExcerpt(
  category: string,
  notesDir: string = DEFAULT_NOTES_DIR,
  random: () => number = Math.random
): string | undefined {
  const filePath = path.join(notesDir, `${category}.txt`);

  let information: string;
  try {
    information = fs.readFileSync(filePath, 'utf-8');
  } catch {
    return undefined;
  }

  if (!information.trim()) {
    return undefined;
  }

  if (information.length <= MAX_EXCERPT_LENGTH) {
    return information;
  }

  const totalSections = Math.floor(information.length / SECTION_SIZE);
  if (totalSections <= SECTION_COUNT) {
    return information.slice(0, MAX_EXCERPT_LENGTH);
  }

  // Sample distinct section indices
  const indices = Array.from({ length: totalSections }, (_, i) => i);
  for (let i = indices.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [indices[i], indices[j]] = [indices[j], indices[i]];
  }

  return indices
    .slice(0, SECTION_COUNT)
    .map((idx) => information.slice(idx * SECTION_SIZE, (idx + 1) * SECTION_SIZE))
    .join(' ')
    .slice(0, MAX_EXCERPT_LENGTH);
}
