import { describe, it, expect, beforeEach } from 'vitest';
import { ErrorHandler } from './ErrorHandler';
import { HeadingNotFoundError, SpawnFailureError } from '@core/errors';

describe('ErrorHandler', () => {
  let lines: string[];
  let handler: ErrorHandler;

  beforeEach(() => {
    lines = [];
    handler = new ErrorHandler({ color: false, write: line => lines.push(line) });
  });

  it('should print the message and return the error exit code', () => {
    const status = handler.handleError(new HeadingNotFoundError('deploy', ['deploy']));

    expect(status).toBe(2);
    expect(lines).toEqual(['mdtask: Heading not found: deploy']);
  });

  it('should print the cause on its own line', () => {
    const cause = Object.assign(new Error('spawn ruby ENOENT'), { code: 'ENOENT' });
    const status = handler.handleError(new SpawnFailureError('ruby', ['ruby', '-e', 'x'], cause));

    expect(status).toBe(127);
    expect(lines).toEqual(["mdtask: Failed to start 'ruby': spawn ruby ENOENT", '  Cause: spawn ruby ENOENT']);
  });

  it('should use the generic status for other errors', () => {
    expect(handler.handleError(new TypeError('bad'))).toBe(1);
    expect(handler.handleError('text thrown')).toBe(1);
    expect(lines).toEqual(['mdtask: bad', 'mdtask: Unknown Error: text thrown']);
  });

  it('should add the stack in debug mode', () => {
    const debugHandler = new ErrorHandler({ programName: 'tasks', debug: true, color: false, write: line => lines.push(line) });
    const error = new Error('boom');

    debugHandler.handleError(error);

    expect(lines[0]).toBe('tasks: boom');
    expect(lines[1]).toBe(error.stack);
  });
});
