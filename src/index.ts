// Main entry point: wire the engine, start the HTTP server, close it on SIGTERM/SIGINT

import { createProviderAdapter } from './adapters/index.js';
import { loadConfig, type ProviderSelection } from './config.js';
import { makeLogger } from './logger.js';
import { createServer } from './server.js';
import { ChatService } from './services/chatService.js';
import { ConfigFileStore } from './services/configFiles.js';
import { ConversationStore } from './services/conversationStore.js';
import { EntityRegistry } from './services/entityIndex.js';
import { HomeAssistantClient } from './services/homeAssistant.js';
import { HtmlDraftStore } from './services/htmlDraftStore.js';
import { IntentClassifier } from './services/intentClassifier.js';
import { Orchestrator } from './services/orchestrator.js';
import { SelectionStore } from './services/selectionStore.js';
import { SnapshotStore } from './services/snapshotStore.js';
import { ToolExecutor } from './services/toolExecutor.js';
import { ToolRegistry } from './services/toolRegistry.js';

async function start(): Promise<void> {
  const config = loadConfig();
  const logger = makeLogger();
  logger.level = config.logLevel;

  const ha = new HomeAssistantClient({
    baseUrl: config.haUrl,
    token: config.haToken,
    timeoutMs: config.requestTimeoutMs,
    logger: logger.child({ component: 'home-assistant' }),
  });
  const snapshots = new SnapshotStore(config.dataDir, config.maxSnapshotsPerFile, logger.child({ component: 'snapshots' }));
  const configFiles = new ConfigFileStore(config.haConfigDir, snapshots, logger.child({ component: 'config-files' }));

  const registry = new ToolRegistry();
  const executor = new ToolExecutor(
    registry,
    { ha, configFiles, snapshots, htmlDrafts: new HtmlDraftStore(), logger: logger.child({ component: 'tools' }) },
    { default: config.toolResultLimit, large: config.toolResultLargeLimit },
    logger.child({ component: 'executor' }),
  );
  const createAdapter = (selection: ProviderSelection) => createProviderAdapter(selection, config, logger);
  const conversations = new ConversationStore(config.dataDir, config.maxConversations, logger.child({ component: 'conversations' }));
  const selection = new SelectionStore(config.dataDir, config.selection, logger.child({ component: 'selection' }));

  const chat = new ChatService({
    classifier: new IntentClassifier(registry, logger.child({ component: 'classifier' })),
    orchestrator: new Orchestrator({ registry, executor, maxRounds: config.maxRounds, logger }),
    entities: new EntityRegistry(ha, logger.child({ component: 'entities' })),
    conversations,
    selection,
    createAdapter,
    language: config.language,
    readOnlyDefault: config.readOnlyDefault,
    maxHistoryMessages: config.maxHistoryMessages,
    logger,
  });

  const server = await createServer({ config, chat, conversations, selection, createAdapter, logger });
  await server.listen({ host: config.host, port: config.port });

  const current = await selection.get();
  logger.info(
    { host: config.host, port: config.port, provider: current.provider, model: current.model, tools: registry.size },
    'Chat gateway ready',
  );

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Shutting down');
    try {
      await server.close();
      ha.close();
      process.exit(0);
    } catch (err) {
      logger.error({ err }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

start().catch((err: unknown) => {
  console.error('Failed to start server:', err);
  process.exit(1);
});
