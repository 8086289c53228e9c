/**
 * ProxyEngine with a fake backend gateway and device directory.
 *
 * The fake device uses a real SealedBoxCodec, so every sensitive-tool test
 * exercises the actual encrypt → forward → decrypt path.
 */

import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';

import { ProxyEngine } from './engine.js';
import { SENSITIVE_TOOLS } from './tools.js';
import type { DeviceKeySource } from '../remote/device-keys.js';
import type { ToolGateway } from '../remote/gateway.js';
import { SealedBoxCodec, generateKeypair } from '../shared/crypto/index.js';
import {
  DecryptionError,
  DeviceKeyFetchError,
  GatewayError,
  InvalidToolArgumentsError,
  NoRecipientKeyError,
  SensitiveToolError,
} from '../shared/errors.js';

function tool(name: string): Tool {
  return { name, description: `${name} tool`, inputSchema: { type: 'object' } };
}

function text(value: string): CallToolResult {
  return { content: [{ type: 'text', text: value }] };
}

/** Open a sealed request the way the human's device would. */
function openOnDevice(device: SealedBoxCodec, agent: SealedBoxCodec, args: Record<string, unknown> | undefined) {
  return device.open(String(args?.encrypted_payload), agent.publicKey);
}

describe('ProxyEngine', () => {
  let agent: SealedBoxCodec;
  let device: SealedBoxCodec;
  let listRemoteTools: Mock<ToolGateway['listRemoteTools']>;
  let invokeRemoteTool: Mock<ToolGateway['invokeRemoteTool']>;
  let fetchDevicePublicKeys: Mock<DeviceKeySource['fetchDevicePublicKeys']>;
  let engine: ProxyEngine;

  beforeEach(() => {
    vi.spyOn(console, 'error').mockImplementation(() => {});
    agent = new SealedBoxCodec(generateKeypair());
    device = new SealedBoxCodec(generateKeypair());

    listRemoteTools = vi.fn<ToolGateway['listRemoteTools']>().mockResolvedValue([]);
    invokeRemoteTool = vi.fn<ToolGateway['invokeRemoteTool']>().mockResolvedValue(text('ok'));
    fetchDevicePublicKeys = vi
      .fn<DeviceKeySource['fetchDevicePublicKeys']>()
      .mockResolvedValue([device.publicKey]);

    engine = new ProxyEngine({
      gateway: { listRemoteTools, invokeRemoteTool },
      deviceKeys: { fetchDevicePublicKeys },
      codec: agent,
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  // ── Catalog ──────────────────────────────────────────────────────────────

  describe('listTools', () => {
    it('should hide sealed variants and append the local sensitive tools', async () => {
      listRemoteTools.mockResolvedValue([
        tool('search_docs'),
        tool('request_human_input_e2ee'),
        tool('notify_human_e2ee'),
        tool('run_query'),
      ]);

      const tools = await engine.listTools();

      expect(tools.map((t) => t.name)).toEqual([
        'search_docs',
        'run_query',
        'request_human_input',
        'notify_human',
      ]);
    });

    it('should replace a backend descriptor that shares a local tool name', async () => {
      listRemoteTools.mockResolvedValue([tool('request_human_input'), tool('search_docs')]);

      const tools = await engine.listTools();

      expect(tools.map((t) => t.name)).toEqual(['search_docs', 'request_human_input', 'notify_human']);
      expect(tools[1]).toBe(SENSITIVE_TOOLS.get('request_human_input')?.descriptor);
    });

    it('should pass backend descriptors through untouched', async () => {
      const descriptor: Tool = {
        name: 'search_docs',
        description: 'Full-text search',
        inputSchema: { type: 'object', properties: { query: { type: 'string' } }, required: ['query'] },
      };
      listRemoteTools.mockResolvedValue([descriptor]);

      const tools = await engine.listTools();

      expect(tools[0]).toBe(descriptor);
    });

    it('should list only the local tools when the backend is unreachable', async () => {
      listRemoteTools.mockRejectedValue(new GatewayError('transport', 'connect ECONNREFUSED'));

      const tools = await engine.listTools();

      expect(tools.map((t) => t.name)).toEqual(['request_human_input', 'notify_human']);
    });
  });

  // ── Pass-through ─────────────────────────────────────────────────────────

  describe('pass-through tools', () => {
    it('should forward arguments and return the backend result unchanged', async () => {
      const args = { query: 'sealed box', nested: { limit: 3 } };
      const result: CallToolResult = { content: [{ type: 'text', text: '3 matches' }], isError: true };
      invokeRemoteTool.mockResolvedValue(result);

      const actual = await engine.callTool('search_docs', args);

      expect(actual).toBe(result);
      expect(invokeRemoteTool).toHaveBeenCalledWith('search_docs', args, undefined);
      expect(invokeRemoteTool.mock.calls[0]?.[1]).toBe(args);
    });

    it('should forward missing arguments as missing', async () => {
      await engine.callTool('list_projects');
      expect(invokeRemoteTool).toHaveBeenCalledWith('list_projects', undefined, undefined);
    });

    it('should not touch device keys or crypto', async () => {
      await engine.callTool('search_docs', {});
      expect(fetchDevicePublicKeys).not.toHaveBeenCalled();
    });

    it('should hand the caller signal to the gateway', async () => {
      const controller = new AbortController();

      await engine.callTool('search_docs', { query: 'x' }, controller.signal);

      expect(invokeRemoteTool.mock.calls[0]?.[2]).toBe(controller.signal);
    });

    it('should propagate gateway errors unchanged', async () => {
      const failure = new GatewayError('timeout', 'Tool call search_docs timed out after 900s waiting for the backend');
      invokeRemoteTool.mockRejectedValue(failure);

      await expect(engine.callTool('search_docs', {})).rejects.toBe(failure);
    });
  });

  // ── request_human_input ──────────────────────────────────────────────────

  describe('request_human_input', () => {
    it('should seal the prompt for the device and return the decrypted reply', async () => {
      invokeRemoteTool.mockImplementation(async (name, args) => {
        expect(name).toBe('request_human_input_e2ee');
        expect(openOnDevice(device, agent, args)).toEqual({ prompt: 'Deploy?', choices: ['Yes', 'No'] });
        return text(device.seal({ response: 'Yes' }, agent.publicKey));
      });

      const result = await engine.callTool('request_human_input', { prompt: 'Deploy?', choices: ['Yes', 'No'] });

      expect(result).toEqual({ content: [{ type: 'text', text: 'Yes' }] });
      expect(invokeRemoteTool).toHaveBeenCalledTimes(1);
    });

    it('should send only the encrypted payload to the backend', async () => {
      invokeRemoteTool.mockResolvedValue(text(device.seal('ok', agent.publicKey)));

      await engine.callTool('request_human_input', { prompt: 'Which branch?' });

      const sent = invokeRemoteTool.mock.calls[0]?.[1];
      expect(Object.keys(sent ?? {})).toEqual(['encrypted_payload']);
      expect(JSON.stringify(sent)).not.toContain('Which branch?');
    });

    it('should drop unknown argument fields before sealing', async () => {
      invokeRemoteTool.mockImplementation(async (_name, args) => {
        expect(openOnDevice(device, agent, args)).toEqual({ prompt: 'Go?', placeholder_text: 'y/n' });
        return text(device.seal('y', agent.publicKey));
      });

      await engine.callTool('request_human_input', { prompt: 'Go?', placeholder_text: 'y/n', extra: 1 });
    });

    it('should return a plain-string reply as-is', async () => {
      invokeRemoteTool.mockResolvedValue(text(device.seal('Use main', agent.publicKey)));

      const result = await engine.callTool('request_human_input', { prompt: 'Which branch?' });

      expect(result).toEqual({ content: [{ type: 'text', text: 'Use main' }] });
    });

    it('should render a structured reply without a response field as JSON', async () => {
      invokeRemoteTool.mockResolvedValue(text(device.seal({ approved: true }, agent.publicKey)));

      const result = await engine.callTool('request_human_input', { prompt: 'Approve?' });

      expect(result).toEqual({ content: [{ type: 'text', text: '{\n  "approved": true\n}' }] });
    });

    it('should address only the first registered device', async () => {
      const second = new SealedBoxCodec(generateKeypair());
      fetchDevicePublicKeys.mockResolvedValue([device.publicKey, second.publicKey]);
      invokeRemoteTool.mockImplementation(async (_name, args) => {
        expect(() => openOnDevice(second, agent, args)).toThrow(DecryptionError);
        expect(openOnDevice(device, agent, args)).toEqual({ prompt: 'Hi' });
        return text(device.seal('hello', agent.publicKey));
      });

      const result = await engine.callTool('request_human_input', { prompt: 'Hi' });

      expect(result).toEqual({ content: [{ type: 'text', text: 'hello' }] });
    });

    it('should reject invalid arguments before any network call', async () => {
      const err = await engine.callTool('request_human_input', { choices: ['a'] }).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(InvalidToolArgumentsError);
      expect(err).toHaveProperty('message', 'Invalid arguments for request_human_input: prompt: Required');
      expect(fetchDevicePublicKeys).not.toHaveBeenCalled();
      expect(invokeRemoteTool).not.toHaveBeenCalled();
    });

    it('should fail with no recipient when no device is registered', async () => {
      fetchDevicePublicKeys.mockResolvedValue([]);

      const err = await engine.callTool('request_human_input', { prompt: 'Deploy?' }).catch((e: unknown) => e);

      expect(err).toBeInstanceOf(SensitiveToolError);
      expect(err).toMatchObject({ phase: 'key-retrieval', toolName: 'request_human_input' });
      expect(err instanceof SensitiveToolError && err.cause).toBeInstanceOf(NoRecipientKeyError);
      expect(invokeRemoteTool).not.toHaveBeenCalled();
    });

    it('should name key retrieval when the device directory fails', async () => {
      fetchDevicePublicKeys.mockRejectedValue(new DeviceKeyFetchError(503, 'maintenance'));

      await expect(engine.callTool('request_human_input', { prompt: 'Deploy?' })).rejects.toThrow(
        'request_human_input failed during device key retrieval: Failed to get device public keys: 503 - maintenance',
      );
      expect(invokeRemoteTool).not.toHaveBeenCalled();
    });

    it('should name encryption when the device key is malformed', async () => {
      fetchDevicePublicKeys.mockResolvedValue(['AAAA']);

      await expect(engine.callTool('request_human_input', { prompt: 'Deploy?' })).rejects.toMatchObject({
        phase: 'encryption',
        message: 'request_human_input failed during encryption: Recipient public key is invalid: key must be 32 bytes, got 3',
      });
      expect(invokeRemoteTool).not.toHaveBeenCalled();
    });

    it('should name the backend call when the backend reports a tool error', async () => {
      invokeRemoteTool.mockResolvedValue({ content: [{ type: 'text', text: 'device offline' }], isError: true });

      await expect(engine.callTool('request_human_input', { prompt: 'Deploy?' })).rejects.toThrow(
        'request_human_input failed during backend call: Backend rejected request_human_input_e2ee: device offline',
      );
    });

    it('should keep a backend timeout visible as the cause', async () => {
      const timeout = new GatewayError('timeout', 'Tool call request_human_input_e2ee timed out after 900s waiting for the backend');
      invokeRemoteTool.mockRejectedValue(timeout);

      const err = await engine.callTool('request_human_input', { prompt: 'Deploy?' }).catch((e: unknown) => e);

      expect(err).toMatchObject({ phase: 'backend-call' });
      expect(err instanceof SensitiveToolError && err.cause).toBe(timeout);
    });

    it('should hand the caller signal to the sealed-variant call', async () => {
      const controller = new AbortController();
      invokeRemoteTool.mockResolvedValue(text(device.seal('ok', agent.publicKey)));

      await engine.callTool('request_human_input', { prompt: 'Deploy?' }, controller.signal);

      expect(invokeRemoteTool.mock.calls[0]?.[0]).toBe('request_human_input_e2ee');
      expect(invokeRemoteTool.mock.calls[0]?.[2]).toBe(controller.signal);
    });

    it('should not reach the backend when cancelled before forwarding', async () => {
      const controller = new AbortController();
      fetchDevicePublicKeys.mockImplementation(async () => {
        controller.abort(new Error('caller went away'));
        return [device.publicKey];
      });

      await expect(
        engine.callTool('request_human_input', { prompt: 'Deploy?' }, controller.signal),
      ).rejects.toMatchObject({
        phase: 'backend-call',
        message: 'request_human_input failed during backend call: caller went away',
      });
      expect(invokeRemoteTool).not.toHaveBeenCalled();
    });

    it('should name decryption when the reply was tampered with', async () => {
      invokeRemoteTool.mockResolvedValue(text('AAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAAA'));

      const err = await engine.callTool('request_human_input', { prompt: 'Deploy?' }).catch((e: unknown) => e);

      expect(err).toMatchObject({
        phase: 'decryption',
        message: 'request_human_input failed during decryption: Failed to decrypt sealed payload',
      });
      expect(err instanceof SensitiveToolError && err.cause).toBeInstanceOf(DecryptionError);
    });

    it('should name decryption when the reply has no text', async () => {
      invokeRemoteTool.mockResolvedValue({ content: [] });

      await expect(engine.callTool('request_human_input', { prompt: 'Deploy?' })).rejects.toThrow(
        'request_human_input failed during decryption: Backend reply carried no text content',
      );
    });
  });

  // ── notify_human ─────────────────────────────────────────────────────────

  describe('notify_human', () => {
    it('should seal the message for the device', async () => {
      invokeRemoteTool.mockImplementation(async (name, args) => {
        expect(name).toBe('notify_human_e2ee');
        expect(openOnDevice(device, agent, args)).toEqual({ message: 'Build finished' });
        return text('Delivered to 1 device');
      });

      const result = await engine.callTool('notify_human', { message: 'Build finished' });

      expect(result).toEqual({ content: [{ type: 'text', text: 'Delivered to 1 device' }] });
    });

    it('should fall back to a fixed acknowledgement when the backend sends no text', async () => {
      invokeRemoteTool.mockResolvedValue({ content: [] });

      const result = await engine.callTool('notify_human', { message: 'Build finished' });

      expect(result).toEqual({ content: [{ type: 'text', text: 'Notification sent successfully' }] });
    });

    it('should reject an empty message', async () => {
      await expect(engine.callTool('notify_human', { message: '' })).rejects.toBeInstanceOf(
        InvalidToolArgumentsError,
      );
    });
  });
});
