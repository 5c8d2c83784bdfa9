import { describe, it, expect } from 'vitest';
import {
  QueryTreeError,
  NotFoundError,
  InvalidArgumentError,
  MalformedDefinitionError,
} from '../../src/errors.js';

describe('QueryTreeError', () => {
  it('has correct name', () => {
    expect(new QueryTreeError('msg').name).toBe('QueryTreeError');
  });

  it('is instanceof Error', () => {
    expect(new QueryTreeError('msg')).toBeInstanceOf(Error);
  });

  it('cause is undefined when not provided', () => {
    expect(new QueryTreeError('msg').cause).toBeUndefined();
  });

  it('stores the cause when provided', () => {
    const root = new Error('root');
    expect(new QueryTreeError('msg', root).cause).toBe(root);
  });
});

describe('NotFoundError', () => {
  it('has correct name', () => {
    expect(new NotFoundError('a.b', 'b').name).toBe('NotFoundError');
  });

  it('is instanceof NotFoundError, QueryTreeError and Error', () => {
    const err = new NotFoundError('a.b', 'b');
    expect(err).toBeInstanceOf(NotFoundError);
    expect(err).toBeInstanceOf(QueryTreeError);
    expect(err).toBeInstanceOf(Error);
  });

  it('stores path and segment', () => {
    const err = new NotFoundError('a.b', 'b');
    expect(err.path).toBe('a.b');
    expect(err.segment).toBe('b');
  });

  it('generates a default message when none provided', () => {
    const err = new NotFoundError('a.b', 'b');
    expect(err.message).toBe('No query labeled "b" while resolving "a.b"');
  });

  it('uses custom message when provided', () => {
    expect(new NotFoundError('a', 'a', 'my message').message).toBe('my message');
  });

  it('has a stack trace', () => {
    expect(new NotFoundError('a', 'a').stack).toBeDefined();
  });
});

describe('InvalidArgumentError', () => {
  it('has correct name', () => {
    expect(new InvalidArgumentError('strategy', 'sideways').name).toBe('InvalidArgumentError');
  });

  it('is instanceof QueryTreeError', () => {
    expect(new InvalidArgumentError('strategy', 'sideways')).toBeInstanceOf(QueryTreeError);
  });

  it('stores argument and value', () => {
    const err = new InvalidArgumentError('strategy', 'sideways');
    expect(err.argument).toBe('strategy');
    expect(err.value).toBe('sideways');
  });

  it('generates a default message when none provided', () => {
    expect(new InvalidArgumentError('strategy', 'sideways').message).toBe(
      'Invalid value for strategy: sideways',
    );
  });
});

describe('MalformedDefinitionError', () => {
  it('has correct name', () => {
    expect(new MalformedDefinitionError('x', 'bad').name).toBe('MalformedDefinitionError');
  });

  it('is instanceof QueryTreeError', () => {
    expect(new MalformedDefinitionError('x', 'bad')).toBeInstanceOf(QueryTreeError);
  });

  it('stores the path and prefixes the message with it', () => {
    const err = new MalformedDefinitionError('cCheck.dCheck', 'expected a mapping, got number');
    expect(err.path).toBe('cCheck.dCheck');
    expect(err.message).toBe('Malformed definition at "cCheck.dCheck": expected a mapping, got number');
  });

  it('names the root when the path is empty', () => {
    expect(new MalformedDefinitionError('', 'bad').message).toBe('Malformed definition at "#root": bad');
  });

  it('stores the cause when provided', () => {
    const root = new SyntaxError('Unexpected token');
    expect(new MalformedDefinitionError('', 'bad', root).cause).toBe(root);
  });
});
