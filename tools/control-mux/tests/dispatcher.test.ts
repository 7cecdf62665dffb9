import { describe, it, expect, vi } from 'vitest';
import { CallbackRegistry, type CallbackRegistryInit } from '../src/callback-registry.js';
import {
  ControlRequestDispatcher,
  parsePermissionSuggestions,
  serializeHookOutput,
  serializePermissionResult,
} from '../src/dispatcher.js';
import type { CanUseTool, HookCallback } from '../src/protocol-types.js';

function makeDispatcher(init: CallbackRegistryInit = {}): ControlRequestDispatcher {
  return new ControlRequestDispatcher({ registry: CallbackRegistry.from(init) });
}

const signal = new AbortController().signal;

describe('serializePermissionResult', () => {
  it('serializes a bare allow', () => {
    expect(serializePermissionResult({ behavior: 'allow' })).toEqual({ behavior: 'allow' });
  });

  it('writes overrides under their snake_case wire keys', () => {
    expect(
      serializePermissionResult({
        behavior: 'allow',
        updatedInput: { command: 'ls' },
        updatedPermissions: [{ type: 'setMode', mode: 'plan', destination: 'session' }],
      }),
    ).toEqual({
      behavior: 'allow',
      updated_input: { command: 'ls' },
      updated_permissions: [{ type: 'setMode', mode: 'plan', destination: 'session' }],
    });
  });

  it('sets interrupt on a deny only when true', () => {
    expect(serializePermissionResult({ behavior: 'deny', message: 'no' })).toEqual({
      behavior: 'deny',
      message: 'no',
    });
    expect(serializePermissionResult({ behavior: 'deny', message: 'no', interrupt: true })).toEqual({
      behavior: 'deny',
      message: 'no',
      interrupt: true,
    });
  });
});

describe('serializeHookOutput', () => {
  it('maps undefined output to an empty payload', () => {
    expect(serializeHookOutput(undefined)).toEqual({});
  });

  it('keeps only the fields that are set', () => {
    expect(serializeHookOutput({ decision: 'block', systemMessage: 'stop' })).toEqual({
      decision: 'block',
      systemMessage: 'stop',
    });
  });
});

describe('parsePermissionSuggestions', () => {
  it('drops entries that are not permission updates', () => {
    expect(
      parsePermissionSuggestions([
        { type: 'addRules', rules: [{ toolName: 'Bash' }], behavior: 'allow' },
        { type: 'launchRockets' },
        'nonsense',
      ]),
    ).toEqual([{ type: 'addRules', rules: [{ toolName: 'Bash' }], behavior: 'allow' }]);
  });

  it('treats a missing list as empty', () => {
    expect(parsePermissionSuggestions(undefined)).toEqual([]);
  });
});

describe('ControlRequestDispatcher', () => {
  describe('can_use_tool', () => {
    it('allows everything when no callback is registered', async () => {
      const outcome = await makeDispatcher().dispatch(
        'r1',
        { subtype: 'can_use_tool', tool_name: 'Bash', input: {} },
        signal,
      );
      expect(outcome).toEqual({ ok: true, response: { behavior: 'allow' } });
    });

    it('allows malformed requests when no callback is registered', async () => {
      const dispatcher = makeDispatcher();

      await expect(dispatcher.dispatch('r1', { subtype: 'can_use_tool', input: {} }, signal)).resolves.toEqual({
        ok: true,
        response: { behavior: 'allow' },
      });
      await expect(
        dispatcher.dispatch('r2', { subtype: 'can_use_tool', tool_name: 'Bash', input: null }, signal),
      ).resolves.toEqual({ ok: true, response: { behavior: 'allow' } });
    });

    it('passes tool name, input and context to the callback', async () => {
      const canUseTool = vi.fn<CanUseTool>(async () => ({ behavior: 'deny', message: 'blocked' }));
      const outcome = await makeDispatcher({ canUseTool }).dispatch(
        'r1',
        {
          subtype: 'can_use_tool',
          tool_name: 'Write',
          input: { file_path: '/tmp/x' },
          tool_use_id: 'toolu_1',
          blocked_path: '/tmp/x',
          permission_suggestions: [{ type: 'addDirectories', directories: ['/tmp'] }],
        },
        signal,
      );

      expect(outcome).toEqual({ ok: true, response: { behavior: 'deny', message: 'blocked' } });
      expect(canUseTool).toHaveBeenCalledWith(
        'Write',
        { file_path: '/tmp/x' },
        {
          signal,
          suggestions: [{ type: 'addDirectories', directories: ['/tmp'] }],
          toolUseId: 'toolu_1',
          blockedPath: '/tmp/x',
        },
      );
    });

    it('defaults a missing input to an empty object', async () => {
      const canUseTool = vi.fn<CanUseTool>(() => ({ behavior: 'allow' }));
      await makeDispatcher({ canUseTool }).dispatch('r1', { subtype: 'can_use_tool', tool_name: 'Read' }, signal);
      expect(canUseTool.mock.calls[0]?.[1]).toEqual({});
    });

    it('treats a null input as an empty object', async () => {
      const canUseTool = vi.fn<CanUseTool>(() => ({ behavior: 'allow' }));
      await makeDispatcher({ canUseTool }).dispatch(
        'r1',
        { subtype: 'can_use_tool', tool_name: 'Read', input: null },
        signal,
      );
      expect(canUseTool.mock.calls[0]?.[1]).toEqual({});
    });

    it('sends updated input back under updated_input', async () => {
      const canUseTool = vi.fn<CanUseTool>(() => ({ behavior: 'allow', updatedInput: { command: 'ls -la' } }));
      const outcome = await makeDispatcher({ canUseTool }).dispatch(
        'r1',
        { subtype: 'can_use_tool', tool_name: 'Bash', input: { command: 'ls' } },
        signal,
      );
      expect(outcome).toEqual({ ok: true, response: { behavior: 'allow', updated_input: { command: 'ls -la' } } });
    });

    it('turns a throwing callback into a failure with its message', async () => {
      const canUseTool = vi.fn<CanUseTool>(async () => {
        throw new Error('policy service down');
      });
      const outcome = await makeDispatcher({ canUseTool }).dispatch(
        'r1',
        { subtype: 'can_use_tool', tool_name: 'Bash', input: {} },
        signal,
      );
      expect(outcome).toEqual({ ok: false, error: 'policy service down' });
    });

    it('fails a request without tool_name when a callback is registered', async () => {
      const canUseTool = vi.fn<CanUseTool>(() => ({ behavior: 'allow' }));
      const outcome = await makeDispatcher({ canUseTool }).dispatch('r1', { subtype: 'can_use_tool' }, signal);
      expect(canUseTool).not.toHaveBeenCalled();
      expect(outcome).toEqual({ ok: false, error: 'invalid can_use_tool request: tool_name: Required' });
    });
  });

  describe('hook_callback', () => {
    it('invokes the callback registered under the id', async () => {
      const hook = vi.fn<HookCallback>(async () => ({ systemMessage: 'noted' }));
      const outcome = await makeDispatcher({ hooks: { PostToolUse: [{ hooks: [hook] }] } }).dispatch(
        'r2',
        { subtype: 'hook_callback', callback_id: 'hook_PostToolUse_0', input: { tool_name: 'Bash' }, tool_use_id: 'toolu_2' },
        signal,
      );

      expect(outcome).toEqual({ ok: true, response: { systemMessage: 'noted' } });
      expect(hook).toHaveBeenCalledWith({ tool_name: 'Bash' }, 'toolu_2', { signal });
    });

    it('passes undefined when there is no tool use id', async () => {
      const hook = vi.fn<HookCallback>(() => undefined);
      const outcome = await makeDispatcher({ hooks: { Stop: [{ hooks: [hook] }] } }).dispatch(
        'r2',
        { subtype: 'hook_callback', callback_id: 'hook_Stop_0', input: {} },
        signal,
      );

      expect(outcome).toEqual({ ok: true, response: {} });
      expect(hook).toHaveBeenCalledWith({}, undefined, { signal });
    });

    it('passes a null input as an empty object', async () => {
      const hook = vi.fn<HookCallback>(() => undefined);
      await makeDispatcher({ hooks: { Stop: [{ hooks: [hook] }] } }).dispatch(
        'r2',
        { subtype: 'hook_callback', callback_id: 'hook_Stop_0', input: null },
        signal,
      );
      expect(hook).toHaveBeenCalledWith({}, undefined, { signal });
    });

    it('fails with the missing callback id', async () => {
      const outcome = await makeDispatcher().dispatch(
        'r2',
        { subtype: 'hook_callback', callback_id: 'hook_PreToolUse_7', input: {} },
        signal,
      );
      expect(outcome).toEqual({ ok: false, error: 'callback not found: hook_PreToolUse_7' });
    });

    it('turns a rejected hook into a failure', async () => {
      const hook = vi.fn<HookCallback>(() => Promise.reject(new Error('hook crashed')));
      const outcome = await makeDispatcher({ hooks: { Stop: [{ hooks: [hook] }] } }).dispatch(
        'r2',
        { subtype: 'hook_callback', callback_id: 'hook_Stop_0' },
        signal,
      );
      expect(outcome).toEqual({ ok: false, error: 'hook crashed' });
    });
  });

  describe('mcp_message', () => {
    it('fails for an unknown channel', async () => {
      const outcome = await makeDispatcher().dispatch(
        'r3',
        { subtype: 'mcp_message', server_name: 'calc', message: {} },
        signal,
      );
      expect(outcome).toEqual({ ok: false, error: 'side channel not found: calc' });
    });

    it('fails with "not implemented" for a channel without a handler', async () => {
      const outcome = await makeDispatcher({ sideChannels: { calc: {} } }).dispatch(
        'r3',
        { subtype: 'mcp_message', server_name: 'calc', message: {} },
        signal,
      );
      expect(outcome).toEqual({ ok: false, error: 'side channel calc: message handling not implemented' });
    });

    it('wraps the handler result', async () => {
      const handle = vi.fn(async () => ({ jsonrpc: '2.0', id: 1, result: { sum: 3 } }));
      const outcome = await makeDispatcher({ sideChannels: { calc: { handle } } }).dispatch(
        'r3',
        { subtype: 'mcp_message', server_name: 'calc', message: { jsonrpc: '2.0', id: 1, method: 'add' } },
        signal,
      );

      expect(outcome).toEqual({
        ok: true,
        response: { mcp_response: { jsonrpc: '2.0', id: 1, result: { sum: 3 } } },
      });
      expect(handle).toHaveBeenCalledWith({ jsonrpc: '2.0', id: 1, method: 'add' }, { signal });
    });
  });

  it('rejects an inbound interrupt', async () => {
    const outcome = await makeDispatcher().dispatch('r4', { subtype: 'interrupt' }, signal);
    expect(outcome).toEqual({ ok: false, error: 'unsupported control request subtype: interrupt' });
  });

  it('fails a missing request body', async () => {
    const outcome = await makeDispatcher().dispatch('r5', undefined, signal);
    expect(outcome).toEqual({ ok: false, error: 'invalid control request' });
  });
});
