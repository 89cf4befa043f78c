import { describe, expect, it } from 'vitest';
import {
  AuthError,
  ConfigError,
  DownloadError,
  errorMessage,
  HttpStatusError,
  isTransportError,
  NetworkError,
  ParseError,
  SubmetaError,
  TimeoutError,
} from './custom-errors.js';

describe('Custom Errors', () => {
  it('SubmetaError should store message and have correct name', () => {
    const error = new SubmetaError('test message');
    expect(error).toBeInstanceOf(Error);
    expect(error.message).toBe('test message');
    expect(error.name).toBe('SubmetaError');
  });

  it('ConfigError should inherit from SubmetaError', () => {
    const error = new ConfigError('config error');
    expect(error).toBeInstanceOf(SubmetaError);
    expect(error.name).toBe('ConfigError');
  });

  it('NetworkError should keep the url and the underlying cause', () => {
    const cause = new Error('ECONNREFUSED');
    const error = new NetworkError('connection refused', 'https://b.submeta.io/api', cause);
    expect(error.url).toBe('https://b.submeta.io/api');
    expect(error.cause).toBe(cause);
    expect(error.name).toBe('NetworkError');
  });

  it('NetworkError should leave cause unset when none is given', () => {
    expect('cause' in new NetworkError('reset', 'https://submeta.io')).toBe(false);
  });

  it('HttpStatusError and TimeoutError should carry request details', () => {
    const status = new HttpStatusError('HTTP 503 for url: https://submeta.io', 'https://submeta.io', 503);
    const timeout = new TimeoutError('timed out', 'https://submeta.io', 10_000);
    expect(status.status).toBe(503);
    expect(timeout.timeoutMs).toBe(10_000);
    expect(timeout.name).toBe('TimeoutError');
  });

  it('ParseError should record the missing field path', () => {
    const error = new ParseError('missing', 'props.pageProps.course');
    expect(error.path).toBe('props.pageProps.course');
    expect(error).toBeInstanceOf(SubmetaError);
  });

  it('AuthError should keep platform errors', () => {
    const error = new AuthError('Login failed', [{ key: 'password', message: 'Invalid' }]);
    expect(error.errors).toEqual([{ key: 'password', message: 'Invalid' }]);
    expect(new AuthError('no token').errors).toEqual([]);
  });

  it('DownloadError should keep the manifest url', () => {
    const error = new DownloadError('yt-dlp failed', 'https://stream.test/t/manifest/video.mpd');
    expect(error.url).toBe('https://stream.test/t/manifest/video.mpd');
    expect(error.name).toBe('DownloadError');
  });

  it('isTransportError should match only request-layer errors', () => {
    expect(isTransportError(new NetworkError('x', 'u'))).toBe(true);
    expect(isTransportError(new HttpStatusError('x', 'u', 500))).toBe(true);
    expect(isTransportError(new TimeoutError('x', 'u', 1))).toBe(true);
    expect(isTransportError(new ParseError('x'))).toBe(false);
    expect(isTransportError(new Error('x'))).toBe(false);
  });

  it('errorMessage should render non-errors as strings', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
    expect(errorMessage(42)).toBe('42');
  });
});
