#!/usr/bin/env node

import { join, resolve } from 'path';
import { homedir } from 'os';
import { generateKeyPair, loadKeyPair, saveKeyPair } from './signer.js';

const DEFAULT_KEY_DIR = resolve(homedir(), '.querygate', 'keys');

function main() {
  const keyDir = process.argv[2] || DEFAULT_KEY_DIR;

  console.log('querygate audit key generator');
  console.log('─'.repeat(40));
  console.log(`Key directory: ${keyDir}`);

  const existing = loadKeyPair(keyDir);
  if (existing) {
    console.log('\nKeys already exist at this location.');
    console.log('To regenerate, delete the existing keys first:');
    console.log(`  rm -rf ${keyDir}`);
    process.exit(1);
  }

  console.log('\nGenerating Ed25519 key pair...');
  saveKeyPair(keyDir, generateKeyPair());

  console.log('\nKeys generated:');
  console.log(`  Private key: ${join(keyDir, 'querygate.key')} (mode 600)`);
  console.log(`  Public key:  ${join(keyDir, 'querygate.pub')} (mode 644)`);
  console.log('\nAudit records written from now on are signed. Records without a');
  console.log('signature are still chain-checked by GET /api/health.');
}

main();
