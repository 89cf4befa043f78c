/**
 * Replace every character outside [A-Za-z0-9 ._] with an underscore.
 * Works per code point, so the result has as many characters as the input.
 */
export function sanitizeFilename(name: string): string {
  return name.replace(/[^A-Za-z0-9 ._]/gu, '_');
}

/**
 * Directory name for a chapter: "{position}. {title}" (1-based)
 */
export function chapterDirName(position: number, title: string): string {
  return `${position}. ${sanitizeFilename(title)}`;
}

/**
 * Filename stem for a video: "{position}. {title}" (1-based, no extension)
 */
export function videoFileStem(position: number, title: string): string {
  return `${position}. ${sanitizeFilename(title)}`;
}
