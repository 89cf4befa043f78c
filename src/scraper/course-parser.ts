import { z } from 'zod';
import { ParseError } from '../errors/custom-errors.js';
import type { Chapter, Course } from '../types/course.types.js';
import { err, ok, type Result } from '../types/result.js';
import { sanitizeFilename } from '../utils/filename-sanitizer.js';

/** Content items carry a GraphQL type tag; only videos are downloaded */
export const VIDEO_TYPENAME = 'Video';

const ContentItemSchema = z.looseObject({
  __typename: z.string(),
});

const VideoItemSchema = z.looseObject({
  title: z.string(),
  id: z.union([z.string(), z.number()]),
});

const ChapterSchema = z.looseObject({
  title: z.string(),
  contents: z.array(ContentItemSchema),
});

/**
 * Shape of the page payload, down to the chapter list
 */
export const CoursePageSchema = z.looseObject({
  props: z.looseObject({
    pageProps: z.looseObject({
      course: z.looseObject({
        chapters: z.array(ChapterSchema),
      }),
    }),
  }),
});

/**
 * Render a Zod issue path as `a.b[1].c`
 */
export function formatPath(path: ReadonlyArray<PropertyKey>): string {
  return path.reduce<string>((acc, segment) => {
    if (typeof segment === 'number') {
      return `${acc}[${segment}]`;
    }
    const key = String(segment);
    return acc === '' ? key : `${acc}.${key}`;
  }, '');
}

function toParseError(error: z.ZodError, prefix: ReadonlyArray<PropertyKey> = []): ParseError {
  const issue = error.issues[0];
  const path = formatPath([...prefix, ...(issue?.path ?? [])]);
  return new ParseError(`Unexpected course data at "${path}": ${issue?.message ?? 'invalid value'}`, path);
}

/**
 * Build the ordered chapter/video mapping from a course page payload.
 *
 * Titles are sanitized for use as path components. A repeated title keeps the
 * position of its first occurrence and the value of its last.
 */
export function parseCourse(payload: unknown): Result<Course, ParseError> {
  const page = CoursePageSchema.safeParse(payload);
  if (!page.success) {
    return err(toParseError(page.error));
  }

  const course = new Map<string, Chapter>();
  const chapters = page.data.props.pageProps.course.chapters;

  for (const [chapterIndex, chapter] of chapters.entries()) {
    const videos = new Map<string, string>();

    for (const [itemIndex, item] of chapter.contents.entries()) {
      if (item.__typename !== VIDEO_TYPENAME) {
        continue;
      }

      const video = VideoItemSchema.safeParse(item);
      if (!video.success) {
        return err(
          toParseError(video.error, ['props', 'pageProps', 'course', 'chapters', chapterIndex, 'contents', itemIndex]),
        );
      }

      videos.set(sanitizeFilename(video.data.title), String(video.data.id));
    }

    course.set(sanitizeFilename(chapter.title), videos);
  }

  return ok(course);
}

/**
 * Total number of videos across all chapters
 */
export function countVideos(course: Course): number {
  let total = 0;
  for (const chapter of course.values()) {
    total += chapter.size;
  }
  return total;
}
