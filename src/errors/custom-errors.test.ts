import { describe, expect, it } from 'vitest';
import {
  CacheError,
  ConfigError,
  DownloadError,
  errorMessage,
  MalformedEntryError,
  NotAvailableError,
  RemoteUnavailableError,
  TagesschauError,
  UsageError,
} from './custom-errors';
import { ExitCode, exitCodeFor } from './exit-codes';

describe('Custom Errors', () => {
  it('TagesschauError should store message and have correct name', () => {
    const error = new TagesschauError('test message');
    expect(error).toBeInstanceOf(Error);
    expect(error.message).toBe('test message');
    expect(error.name).toBe('TagesschauError');
  });

  it('ConfigError and UsageError should inherit from TagesschauError', () => {
    expect(new ConfigError('bad config')).toBeInstanceOf(TagesschauError);
    expect(new ConfigError('bad config').name).toBe('ConfigError');
    expect(new UsageError('bad date').name).toBe('UsageError');
  });

  it('RemoteUnavailableError should keep url and status', () => {
    const error = new RemoteUnavailableError('HTTP 503', 'https://example.com/search', 503);
    expect(error).toBeInstanceOf(TagesschauError);
    expect(error.name).toBe('RemoteUnavailableError');
    expect(error.url).toBe('https://example.com/search');
    expect(error.status).toBe(503);
  });

  it('NotAvailableError should name the date', () => {
    const error = new NotAvailableError('2023-04-21');
    expect(error.date).toBe('2023-04-21');
    expect(error.message).toBe('No 20:00 edition available for 2023-04-21');
  });

  it('DownloadError and CacheError should keep their targets', () => {
    expect(new DownloadError('boom', 'https://example.com/a.mp4').url).toBe('https://example.com/a.mp4');
    expect(new CacheError('unreadable', '/tmp/cache').dir).toBe('/tmp/cache');
    expect(new MalformedEntryError('missing stream').name).toBe('MalformedEntryError');
  });

  it('errorMessage should handle non-Error values', () => {
    expect(errorMessage(new Error('plain'))).toBe('plain');
    expect(errorMessage('text')).toBe('text');
    expect(errorMessage(42)).toBe('42');
  });
});

describe('exitCodeFor', () => {
  it('should map usage and configuration errors to USAGE', () => {
    expect(exitCodeFor(new UsageError('bad date'))).toBe(ExitCode.USAGE);
    expect(exitCodeFor(new ConfigError('bad config'))).toBe(ExitCode.USAGE);
  });

  it('should map fetch failures to RUNTIME', () => {
    expect(exitCodeFor(new RemoteUnavailableError('down', 'https://example.com'))).toBe(ExitCode.RUNTIME);
    expect(exitCodeFor(new NotAvailableError('2023-04-21'))).toBe(ExitCode.RUNTIME);
    expect(exitCodeFor(new DownloadError('failed', 'https://example.com/a.mp4'))).toBe(ExitCode.RUNTIME);
    expect(exitCodeFor(new CacheError('unreadable', '/tmp/cache'))).toBe(ExitCode.RUNTIME);
  });

  it('should map anything else to INTERNAL', () => {
    expect(exitCodeFor(new TypeError('oops'))).toBe(ExitCode.INTERNAL);
    expect(exitCodeFor('string thrown')).toBe(ExitCode.INTERNAL);
  });
});
