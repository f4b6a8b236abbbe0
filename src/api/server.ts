import { ApolloServer } from '@apollo/server';
import { expressMiddleware } from '@apollo/server/express4';
import { ApolloServerPluginDrainHttpServer } from '@apollo/server/plugin/drainHttpServer';
import { makeExecutableSchema } from '@graphql-tools/schema';
import { WebSocketServer } from 'ws';
import { useServer } from 'graphql-ws/lib/use/ws';
import express from 'express';
import http from 'http';
import cors from 'cors';
import bodyParser from 'body-parser';
import fs from 'fs';
import path from 'path';
import type { Engine } from '../engine';
import { createContext, type GraphQLContext } from './context';
import { formatEngineError } from './errors';
import { resolvers } from './resolvers';
import { bridgeEngineEvents } from './resolvers/subscriptions';
import { logger } from '../utils/logger';

export async function startGraphQLServer(engine: Engine): Promise<{
  server: http.Server;
  shutdown: () => Promise<void>;
}> {
  const typeDefs = fs.readFileSync(path.join(__dirname, 'schema.graphql'), 'utf-8');
  const schema = makeExecutableSchema({ typeDefs, resolvers });

  const app = express();
  const httpServer = http.createServer(app);
  const { port, enableSubscriptions } = engine.config.api;

  let disposeSubscriptions = async (): Promise<void> => {};
  let unbridge = (): void => {};
  if (enableSubscriptions) {
    const wsServer = new WebSocketServer({ server: httpServer, path: '/graphql' });
    const serverCleanup = useServer({ schema, context: async () => createContext(engine) }, wsServer);
    disposeSubscriptions = async () => {
      await serverCleanup.dispose();
    };
    unbridge = bridgeEngineEvents(engine);
  }

  const apolloServer = new ApolloServer<GraphQLContext>({
    schema,
    formatError: formatEngineError,
    plugins: [
      ApolloServerPluginDrainHttpServer({ httpServer }),
      {
        async serverWillStart() {
          return {
            async drainServer() {
              await disposeSubscriptions();
            },
          };
        },
      },
    ],
  });

  await apolloServer.start();

  app.use(
    '/graphql',
    cors<cors.CorsRequest>(),
    bodyParser.json(),
    expressMiddleware(apolloServer, {
      context: async () => createContext(engine),
    })
  );

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  await new Promise<void>((resolve) => {
    httpServer.listen(port, resolve);
  });

  logger.info('GraphQL API server started', {
    url: `http://localhost:${port}/graphql`,
    subscriptions: enableSubscriptions ? `ws://localhost:${port}/graphql` : 'disabled',
  });

  const shutdown = async () => {
    logger.info('Shutting down GraphQL server...');
    unbridge();
    await apolloServer.stop();
    logger.info('GraphQL server stopped');
  };

  return { server: httpServer, shutdown };
}
