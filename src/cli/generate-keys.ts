#!/usr/bin/env node
/**
 * Agent identity CLI.
 *
 * Creates the agent's X25519 keypair (the proxy also does this on first
 * start) or shows the fingerprint of an existing one. The key file is
 * written 0600 inside a 0700 directory.
 *
 * Usage:
 *   npx tsx src/cli/generate-keys.ts generate            # Create the default keypair
 *   npx tsx src/cli/generate-keys.ts show                # Fingerprint of the default keypair
 *   npx tsx src/cli/generate-keys.ts generate --path <file>
 */

import fs from 'node:fs';

import { getKeypairPath } from '../shared/config.js';
import {
  fingerprint,
  generateKeypair,
  loadIdentityKeypair,
  saveKeypair,
} from '../shared/crypto/index.js';

function usage(): void {
  console.log(`
Agent identity keys

Usage:
  generate-keys generate [--path <file>]   Create a new agent keypair
  generate-keys show [--path <file>]       Show the fingerprint of an existing keypair

The default key file is ${getKeypairPath()}
(override the directory with HITL_CONFIG_DIR).
`);
}

function generate(filePath: string): void {
  if (fs.existsSync(filePath)) {
    console.error(`\n⚠️  A keypair already exists at ${filePath}`);
    console.error('   Delete it first if you want a new agent identity.');
    const existing = loadIdentityKeypair(filePath);
    console.log(`\n   Existing fingerprint: ${fingerprint(existing.publicKey)}\n`);
    process.exit(1);
  }

  const keys = generateKeypair();
  saveKeypair(keys, filePath);

  console.log(`\n✓ Keypair saved to: ${filePath}`);
  console.log(`  Public key:  ${keys.publicKey}`);
  console.log(`  Fingerprint: ${fingerprint(keys.publicKey)}\n`);
}

function show(filePath: string): void {
  const keys = loadIdentityKeypair(filePath);
  console.log(`Public key:  ${keys.publicKey}`);
  console.log(`Fingerprint: ${fingerprint(keys.publicKey)}`);
}

// ── Main ───────────────────────────────────────────────────────────────────

const args = process.argv.slice(2);

if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
  usage();
  process.exit(0);
}

const pathIndex = args.indexOf('--path');
const customPath = pathIndex >= 0 ? args[pathIndex + 1] : undefined;
if (pathIndex >= 0 && !customPath) {
  console.error('--path needs a file name');
  process.exit(1);
}
const keyPath = customPath ?? getKeypairPath();

try {
  if (args[0] === 'generate') {
    generate(keyPath);
  } else if (args[0] === 'show') {
    show(keyPath);
  } else {
    console.error(`Unknown argument: ${args[0]}`);
    usage();
    process.exit(1);
  }
} catch (err) {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
}
