#!/usr/bin/env node

import 'dotenv/config';
import { buildApplication, buildCommand, run } from '@stricli/core';
import type { CommandContext } from '@stricli/core';
import { reconcileSetlists } from './reconcile-setlists.js';

interface ReconcileFlags {
  config?: string;
  'tour-url'?: string;
  'tour-file'?: string;
  catalog?: string;
  output?: string;
  'deterministic-only': boolean;
  debug: boolean;
}

const reconcileCommand = buildCommand({
  docs: {
    brief: 'Match live setlist track names against the song catalog and write a CSV of matches'
  },
  parameters: {
    flags: {
      config: {
        kind: 'parsed',
        brief: 'Path to configuration file',
        parse: String,
        optional: true
      },
      'tour-url': {
        kind: 'parsed',
        brief: 'Override tour data endpoint URL',
        parse: String,
        optional: true
      },
      'tour-file': {
        kind: 'parsed',
        brief: 'Override local tour data JSON file',
        parse: String,
        optional: true
      },
      catalog: {
        kind: 'parsed',
        brief: 'Override catalog CSV path',
        parse: String,
        optional: true
      },
      output: {
        kind: 'parsed',
        brief: 'Override output CSV path',
        parse: String,
        optional: true
      },
      'deterministic-only': {
        kind: 'boolean',
        brief: 'Skip LLM matching; unresolved tracks get no match',
        default: false
      },
      debug: {
        kind: 'boolean',
        brief: 'Enable debug logging',
        default: false
      }
    },
    aliases: {
      c: 'config',
      o: 'output',
      d: 'debug'
    }
  },
  async func(this: CommandContext, flags: ReconcileFlags): Promise<void> {
    try {
      await reconcileSetlists({
        configPath: flags.config,
        tourUrl: flags['tour-url'],
        tourFile: flags['tour-file'],
        catalogPath: flags.catalog,
        outputOverride: flags.output,
        deterministicOnly: flags['deterministic-only'],
        debug: flags.debug
      });
    } catch (error) {
      console.error('Error:', error instanceof Error ? error.message : String(error));
      process.exitCode = 1;
    }
  }
});

const app = buildApplication(reconcileCommand, {
  name: 'setlist-reconcile',
  versionInfo: {
    currentVersion: '1.0.0'
  }
});

await run(app, process.argv.slice(2), { process });
