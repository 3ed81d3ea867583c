#!/usr/bin/env node

import { buildApplication, buildCommand, buildRouteMap, run } from '@stricli/core';
import type { CommandContext } from '@stricli/core';
import { webSearch, describeEngines } from './web-search.js';
import { logger } from './utils/logger.js';

interface SearchFlags {
  config?: string;
  engine?: string;
  json: boolean;
  debug: boolean;
}

interface EnginesFlags {
  debug: boolean;
}

/**
 * Run a single query and print the result URLs
 */
const searchCommand = buildCommand({
  docs: {
    brief: 'Search the web with the configured engine and print result URLs',
  },
  parameters: {
    positional: {
      kind: 'tuple',
      parameters: [
        {
          brief: 'Search query',
          parse: String,
          placeholder: 'query',
        },
      ],
    },
    flags: {
      config: {
        kind: 'parsed',
        brief: 'Path to configuration file',
        parse: String,
        optional: true,
      },
      engine: {
        kind: 'parsed',
        brief: 'Engine to use instead of the configured one (e.g. "Bing")',
        parse: String,
        optional: true,
      },
      json: {
        kind: 'boolean',
        brief: 'Print results as a JSON array',
        default: false,
      },
      debug: {
        kind: 'boolean',
        brief: 'Enable debug logging',
        default: false,
      },
    },
    aliases: {
      c: 'config',
      e: 'engine',
      d: 'debug',
    },
  },
  async func(this: CommandContext, flags: SearchFlags, query: string): Promise<void> {
    try {
      const outcome = await webSearch({
        query,
        configPath: flags.config,
        engine: flags.engine,
        debug: flags.debug,
      });

      if (flags.json) {
        console.log(JSON.stringify(outcome.urls, null, 2));
        return;
      }

      if (outcome.urls.length === 0) {
        logger.info(`${outcome.engine}: no results`);
        return;
      }
      for (const url of outcome.urls) {
        console.log(url);
      }
    } catch (error) {
      logger.error(error instanceof Error ? error.message : String(error));
      process.exitCode = 1;
    }
  },
});

/**
 * List registered engines and their requirements
 */
const enginesCommand = buildCommand({
  docs: {
    brief: 'List available search engines',
  },
  parameters: {
    positional: {
      kind: 'tuple',
      parameters: [],
    },
    flags: {
      debug: {
        kind: 'boolean',
        brief: 'Enable debug logging',
        default: false,
      },
    },
  },
  func(this: CommandContext, flags: EnginesFlags): void {
    logger.setDebug(flags.debug);
    for (const engine of describeEngines()) {
      const requirements = engine.requirements.length > 0 ? engine.requirements.join(', ') : 'none';
      logger.info(`${engine.name} (requires: ${requirements})`);
      for (const pkg of engine.missing) {
        logger.warn(`  missing package: ${pkg}`);
      }
    }
  },
});

const routes = buildRouteMap({
  routes: {
    search: searchCommand,
    engines: enginesCommand,
  },
  docs: {
    brief: 'Query web search providers through one interface',
  },
});

const app = buildApplication(routes, {
  name: 'web-search',
  versionInfo: {
    currentVersion: '1.0.0',
  },
});

await run(app, process.argv.slice(2), { process });
