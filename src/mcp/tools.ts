/**
 * Locally defined sensitive tools.
 *
 * These two are never proxied generically: their arguments are sealed for
 * the human's device and sent to the backend's `<name>_e2ee` variant, whose
 * descriptors are hidden from the caller.
 */

import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';

export const PROXY_NAME = 'hitl-e2ee-proxy';
export const PROXY_VERSION = '0.1.0';

/** Suffix marking the sealed variant of a tool on the backend. */
export const E2EE_SUFFIX = '_e2ee';

export function isEncryptedVariant(name: string): boolean {
  return name.endsWith(E2EE_SUFFIX);
}

export function encryptedVariantOf(name: string): string {
  return `${name}${E2EE_SUFFIX}`;
}

export const requestHumanInputArgs = z.object({
  prompt: z.string().min(1),
  choices: z.array(z.string()).optional(),
  placeholder_text: z.string().optional(),
});

export const notifyHumanArgs = z.object({
  message: z.string().min(1),
});

export interface SensitiveTool {
  descriptor: Tool;
  /** Validates the caller's arguments; the parsed value is what gets sealed. */
  args: z.AnyZodObject;
  /** Whether the backend's reply is itself sealed by the device. */
  sealedResponse: boolean;
  /** Text returned when the backend acknowledges without any text. */
  fallbackText?: string;
}

export const SENSITIVE_TOOLS: ReadonlyMap<string, SensitiveTool> = new Map<string, SensitiveTool>([
  [
    'request_human_input',
    {
      descriptor: {
        name: 'request_human_input',
        description:
          'Ask the human a question and wait for their reply. The prompt and the reply are end-to-end encrypted between this agent and the human\'s device; the relay only sees ciphertext. Returns the human\'s reply text.',
        inputSchema: {
          type: 'object',
          properties: {
            prompt: { type: 'string', description: 'Question or request shown to the human' },
            choices: {
              type: 'array',
              items: { type: 'string' },
              description: 'Optional list of answers the human can pick from',
            },
            placeholder_text: {
              type: 'string',
              description: 'Optional placeholder shown in the free-text reply field',
            },
          },
          required: ['prompt'],
        },
      },
      args: requestHumanInputArgs,
      sealedResponse: true,
    },
  ],
  [
    'notify_human',
    {
      descriptor: {
        name: 'notify_human',
        description:
          'Send a one-way notification to the human. The message is end-to-end encrypted for the human\'s device. Returns a delivery acknowledgement.',
        inputSchema: {
          type: 'object',
          properties: {
            message: { type: 'string', description: 'Notification text' },
          },
          required: ['message'],
        },
      },
      args: notifyHumanArgs,
      sealedResponse: false,
      fallbackText: 'Notification sent successfully',
    },
  ],
]);
