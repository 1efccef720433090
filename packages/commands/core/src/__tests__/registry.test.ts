import { describe, it, expect } from 'vitest';
import { CommandRegistry } from '../registry.js';
import { createErrorResponse, createTextResponse } from '../util/responses.js';
import { EchoCommand } from './test-utils.js';

describe('CommandRegistry', () => {
  it('registers and looks up commands by name', () => {
    const registry = new CommandRegistry();
    const command = new EchoCommand();

    registry.register(command);

    expect(registry.getCommand('echo')).toBe(command);
    expect(registry.getCommand('missing')).toBeUndefined();
    expect(registry.getAllCommandNames()).toEqual(['echo']);
  });

  it('replaces a command registered under the same name', () => {
    const registry = new CommandRegistry();
    const replacement = new EchoCommand('echo', ['echo_other']);

    registry.register(new EchoCommand());
    registry.register(replacement);

    expect(registry.size()).toBe(1);
    expect(registry.getCommand('echo')).toBe(replacement);
  });

  it('flattens tool definitions and finds the owning command', () => {
    const registry = new CommandRegistry();
    const first = new EchoCommand('first', ['first_a', 'first_b']);
    const second = new EchoCommand('second', ['second_a']);
    registry.register(first);
    registry.register(second);

    expect(registry.getAllMCPDefinitions().map((tool) => tool.name)).toEqual([
      'first_a',
      'first_b',
      'second_a',
    ]);
    expect(registry.findCommandForTool('second_a')).toBe(second);
    expect(registry.findCommandForTool('nope')).toBeUndefined();
  });
});

describe('responses', () => {
  it('builds error results', () => {
    expect(createErrorResponse('failed')).toEqual({
      content: [{ type: 'text', text: 'failed' }],
      isError: true,
    });
  });

  it('appends the optional hint block', () => {
    expect(createTextResponse('done', 'hint')).toEqual({
      content: [
        { type: 'text', text: 'done' },
        { type: 'text', text: 'hint' },
      ],
    });
  });
});
