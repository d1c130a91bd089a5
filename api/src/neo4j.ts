import { auth, driver, type Driver } from 'neo4j-driver';
import { z } from 'zod';

import { logger } from './utils/logger.js';

const neo4jEnvSchema = z.object({
  NEO4J_URI: z.string().min(1),
  NEO4J_USERNAME: z.string().min(1),
  NEO4J_PASSWORD: z.string().min(1)
});

export type Neo4jConfig = {
  uri: string;
  username: string;
  password: string;
};

/** Connection settings, or null when any credential is unset or blank. */
export function readNeo4jConfig(env: NodeJS.ProcessEnv = process.env): Neo4jConfig | null {
  const parsed = neo4jEnvSchema.safeParse(env);
  if (!parsed.success) {
    return null;
  }
  return {
    uri: parsed.data.NEO4J_URI,
    username: parsed.data.NEO4J_USERNAME,
    password: parsed.data.NEO4J_PASSWORD
  };
}

export async function createNeo4jDriver(env: NodeJS.ProcessEnv = process.env): Promise<Driver | null> {
  const config = readNeo4jConfig(env);
  if (!config) {
    logger.warn('Neo4j credentials missing; serving bundled and uploaded codebooks only.');
    return null;
  }
  const neo4jDriver = driver(config.uri, auth.basic(config.username, config.password));
  try {
    await neo4jDriver.verifyConnectivity();
  } catch (err) {
    await neo4jDriver.close();
    throw err;
  }
  logger.info({ uri: config.uri }, 'Connected to Neo4j codebook store');
  return neo4jDriver;
}
