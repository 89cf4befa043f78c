/**
 * Builders for course page payloads used across tests
 */

export type FixtureItem = { __typename: string; title?: string; id?: string | number };

export type FixtureChapter = { title: string; contents: FixtureItem[] };

export function video(title: string, id: string | number): FixtureItem {
  return { __typename: 'Video', title, id };
}

export function coursePayload(chapters: FixtureChapter[]) {
  return {
    buildId: 'test-build',
    props: {
      pageProps: {
        course: {
          id: 'course-1',
          title: 'Sample Course',
          chapters,
        },
      },
    },
  };
}

export function coursePage(payload: unknown): string {
  return `<!DOCTYPE html>
<html>
  <head><title>Sample Course</title></head>
  <body>
    <div id="__next"></div>
    <script id="__NEXT_DATA__" type="application/json">${JSON.stringify(payload)}</script>
  </body>
</html>`;
}
