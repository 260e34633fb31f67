import { describe, it, expect } from 'vitest';
import {
  AppError,
  ConfigError,
  ParseError,
  MissingFieldError,
  UsageError,
  ResolutionError,
  ProcessError,
  FileIOError,
  PartialBuildError,
  VerificationError,
  StageError,
  isUserError,
} from './errors';

describe('AppError', () => {
  it('should create an error with code and message', () => {
    const error = new AppError('ConfigError', 'Test message');
    expect(error.code).toBe('ConfigError');
    expect(error.message).toBe('Test message');
    expect(error.name).toBe('AppError');
  });

  it('should accept optional cause and details', () => {
    const cause = new Error('Original error');
    const details = { key: 'value' };
    const error = new AppError('ProcessError', 'Test message', { cause, details });
    expect(error.cause).toBe(cause);
    expect(error.details).toEqual(details);
  });

  it('should accept string details', () => {
    const error = new AppError('FileIOError', 'Test', { details: 'string details' });
    expect(error.details).toBe('string details');
  });
});

describe('ConfigError', () => {
  it('should create a ConfigError with correct code', () => {
    const error = new ConfigError('Invalid config');
    expect(error.code).toBe('ConfigError');
    expect(error.name).toBe('ConfigError');
  });

  it('keeps the ConfigError code on parse and missing-field errors', () => {
    const parse = new ParseError('bad json');
    expect(parse).toBeInstanceOf(ConfigError);
    expect(parse.code).toBe('ConfigError');
    expect(parse.name).toBe('ParseError');

    const missing = new MissingFieldError('package', 'package is required');
    expect(missing).toBeInstanceOf(ConfigError);
    expect(missing.field).toBe('package');
    expect(missing.name).toBe('MissingFieldError');
  });
});

describe('runtime errors', () => {
  it('should create a ResolutionError with correct code', () => {
    expect(new ResolutionError('no identity').code).toBe('ResolutionError');
  });

  it('should carry exit code and output on ProcessError', () => {
    const error = new ProcessError('go test failed', { exitCode: 2, output: 'FAIL' });
    expect(error.code).toBe('ProcessError');
    expect(error.exitCode).toBe(2);
    expect(error.output).toBe('FAIL');
  });

  it('should carry the path on FileIOError', () => {
    const error = new FileIOError('/tmp/x', 'cannot write');
    expect(error.code).toBe('FileIOError');
    expect(error.path).toBe('/tmp/x');
  });

  it('should list missing binaries on PartialBuildError', () => {
    const error = new PartialBuildError(['/w/widget_linux_amd64', '/w/widget_darwin_arm64']);
    expect(error.code).toBe('PartialBuildError');
    expect(error.missing).toHaveLength(2);
    expect(error.message).toBe(
      'Compiler failed to build binaries: /w/widget_linux_amd64, /w/widget_darwin_arm64',
    );
  });

  it('should create a VerificationError with correct code', () => {
    expect(new VerificationError('bad signature').code).toBe('VerificationError');
  });
});

describe('StageError', () => {
  it('wraps an AppError and keeps its code', () => {
    const cause = new ResolutionError('no identity');
    const error = new StageError('Sign', cause);
    expect(error.stage).toBe('Sign');
    expect(error.code).toBe('ResolutionError');
    expect(error.cause).toBe(cause);
    expect(error.message).toBe('Sign stage failed: no identity');
  });

  it('wraps plain errors and non-errors as StageError', () => {
    expect(new StageError('Test', new Error('boom')).code).toBe('StageError');
    expect(new StageError('Test', 'boom').message).toBe('Test stage failed: boom');
  });
});

describe('isUserError', () => {
  it('recognises config and usage errors', () => {
    expect(isUserError(new ConfigError('x'))).toBe(true);
    expect(isUserError(new UsageError('x'))).toBe(true);
    expect(isUserError(new StageError('Init', new MissingFieldError('package', 'x')))).toBe(true);
    expect(isUserError(new ProcessError('x'))).toBe(false);
    expect(isUserError(new Error('x'))).toBe(false);
  });
});
