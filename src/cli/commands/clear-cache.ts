import { Command } from 'commander';
import logSymbols from 'log-symbols';
import pc from 'picocolors';
import {
  createRedisConnection,
  createRedisKeyValueStore,
  RedisDocumentCache,
} from '../../schema/cache/redis-document-cache.js';
import { BaseCommandOptions } from '../types.js';

export default (opts: BaseCommandOptions) => {
  const command = new Command('clear-cache');
  command.description(
    'Removes the cached schema document from the persistent cache. Running engines keep their schema until restarted.',
  );
  command.option('--key <cache-key>', 'The cache key. Defaults to the GRAPHQL_CACHE_KEY configuration.');

  command.action(async (options: { key?: string }) => {
    const { cache } = opts.env.engine;
    const key = options.key ?? cache.key;

    if (cache.store !== 'redis') {
      console.log(logSymbols.info + pc.yellow(' The memory cache lives in the engine process, there is nothing to clear.'));
      return;
    }

    const documentCache = new RedisDocumentCache(
      createRedisKeyValueStore(createRedisConnection(cache.redis), { ownsConnection: true }),
    );
    try {
      const removed = await documentCache.forget(key);
      if (removed) {
        console.log(logSymbols.success + pc.green(` Removed the schema cache "${key}".`));
      } else {
        console.log(logSymbols.info + ` The schema cache "${key}" was already empty.`);
      }
    } finally {
      await documentCache.close();
    }
  });

  return command;
};
