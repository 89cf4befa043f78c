import { describe, expect, it } from 'vitest';
import { coursePayload, video } from '../test/fixtures.js';
import { countVideos, formatPath, parseCourse } from './course-parser.js';

describe('parseCourse', () => {
  it('should keep chapters and videos in document order', () => {
    const payload = coursePayload([
      {
        title: 'Getting Started',
        contents: [video('Welcome', 'v1'), video('Setup', 'v2'), video('First steps', 'v3')],
      },
      { title: 'Wrap-up', contents: [video('Goodbye', 'v4')] },
    ]);

    const result = parseCourse(payload);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    const course = result.value;
    expect([...course.keys()]).toEqual(['Getting Started', 'Wrap_up']);
    expect([...(course.get('Getting Started')?.entries() ?? [])]).toEqual([
      ['Welcome', 'v1'],
      ['Setup', 'v2'],
      ['First steps', 'v3'],
    ]);
    expect(course.get('Wrap_up')?.size).toBe(1);
    expect(countVideos(course)).toBe(4);
  });

  it('should skip content items that are not videos', () => {
    const payload = coursePayload([
      {
        title: 'Module 1',
        contents: [video('Lecture', 'v1'), { __typename: 'Quiz', title: 'Check' }, { __typename: 'Document' }],
      },
    ]);

    const result = parseCourse(payload);

    expect(result.ok && [...(result.value.get('Module 1')?.keys() ?? [])]).toEqual(['Lecture']);
  });

  it('should store numeric ids as strings', () => {
    const result = parseCourse(coursePayload([{ title: 'A', contents: [video('One', 42)] }]));

    expect(result.ok && result.value.get('A')?.get('One')).toBe('42');
  });

  it('should sanitize titles', () => {
    const result = parseCourse(coursePayload([{ title: 'Part 1: Basics', contents: [video('What/Why?', 'v1')] }]));

    expect(result.ok && [...result.value.keys()]).toEqual(['Part 1_ Basics']);
    expect(result.ok && result.value.get('Part 1_ Basics')?.get('What_Why_')).toBe('v1');
  });

  it('should accept courses without chapters and chapters without videos', () => {
    expect(parseCourse(coursePayload([])).ok).toBe(true);

    const result = parseCourse(coursePayload([{ title: 'Empty', contents: [] }]));
    expect(result.ok && result.value.get('Empty')?.size).toBe(0);
  });

  it('should keep the first position and the last value for repeated titles', () => {
    const result = parseCourse(
      coursePayload([{ title: 'A', contents: [video('Intro', 'v1'), video('Body', 'v2'), video('Intro', 'v3')] }]),
    );

    expect(result.ok && [...(result.value.get('A')?.entries() ?? [])]).toEqual([
      ['Intro', 'v3'],
      ['Body', 'v2'],
    ]);
  });

  it('should report a missing chapter list with its path', () => {
    const result = parseCourse({ props: { pageProps: { course: { title: 'No chapters' } } } });

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.name).toBe('ParseError');
    expect(result.error.path).toBe('props.pageProps.course.chapters');
  });

  it('should report a missing contents list with its path', () => {
    const payload = coursePayload([{ title: 'A', contents: [] }]);
    const chapters: unknown[] = [...payload.props.pageProps.course.chapters, { title: 'B' }];

    const result = parseCourse({ props: { pageProps: { course: { chapters } } } });

    expect(!result.ok && result.error.path).toBe('props.pageProps.course.chapters[1].contents');
  });

  it('should report a video without an id', () => {
    const result = parseCourse(coursePayload([{ title: 'A', contents: [{ __typename: 'Video', title: 'No id' }] }]));

    expect(!result.ok && result.error.path).toBe('props.pageProps.course.chapters[0].contents[0].id');
  });

  it('should reject payloads that are not objects', () => {
    const result = parseCourse(null);
    expect(!result.ok && result.error.message).toMatch(/^Unexpected course data at ""/);
  });
});

describe('formatPath', () => {
  it('should join keys with dots and indices with brackets', () => {
    expect(formatPath(['props', 'chapters', 2, 'contents', 0])).toBe('props.chapters[2].contents[0]');
  });
});
