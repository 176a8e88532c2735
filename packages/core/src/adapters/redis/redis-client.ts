import { createClient } from "redis"

/**
 * The part of a node-redis client the bulk reader needs.
 */
export type RedisMGetClient = {
  mGet(keys: string[]): Promise<(string | null)[]>
}

export type CreateRedisClientOptions = {
  url: string
}

export type RedisReaderClient = RedisMGetClient & {
  quit(): Promise<void>
}

/**
 * Connect a node-redis client and expose the commands readers use.
 */
export async function createRedisClient(
  options: CreateRedisClientOptions,
): Promise<RedisReaderClient> {
  const client = createClient({ url: options.url })

  await client.connect()

  return {
    mGet: (keys) => client.mGet(keys),
    quit: async () => {
      await client.quit()
    },
  }
}
