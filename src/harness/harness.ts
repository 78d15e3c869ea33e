import { Bot } from 'grammy';

import { DecisionGate } from '../attention/decisionGate.js';
import { AttentionScheduler } from '../attention/scheduler.js';
import { AiSdkTextChat } from '../backend/ai-sdk.js';
import type { TextChatProviderSource } from '../backend/types.js';
import {
  createReplyNotifier,
  resolveTelegramConfig,
  runTelegramAdapter,
  TelegramOutbound,
} from '../channels/telegram.js';
import { loadChimeinConfig } from '../config/load.js';
import type { ChimeinConfig } from '../config/types.js';
import { ContextResolver } from '../host/context.js';
import { InMemoryConversationStore, InMemoryPersonaRegistry } from '../host/memoryStore.js';
import { Lifecycle } from '../util/lifecycle.js';
import { errorFields, log } from '../util/logger.js';

const DEFAULT_PERSONA_ID = 'default';

export interface HarnessBoot {
  readonly configPath: string;
  readonly config: ChimeinConfig;
  readonly lifecycle: Lifecycle;
  readonly chat: AiSdkTextChat | undefined;
  readonly conversations: InMemoryConversationStore;
  readonly context: ContextResolver;
  readonly bot: Bot;
  readonly outbound: TelegramOutbound;
  readonly scheduler: AttentionScheduler;
}

export class Harness {
  private readonly logger = log.child({ component: 'harness' });

  private constructor(private readonly boot: HarnessBoot) {}

  public static async bootFromEnv(opts?: {
    cwd?: string | undefined;
    configPath?: string | undefined;
    env?: NodeJS.ProcessEnv | undefined;
  }): Promise<Harness> {
    const logger = log.child({ component: 'harness' });
    const env = opts?.env ?? process.env;
    const loaded = await loadChimeinConfig({
      cwd: opts?.cwd,
      configPath: opts?.configPath,
      env,
    });
    const { config } = loaded;
    const telegram = resolveTelegramConfig(env);

    let chat: AiSdkTextChat | undefined;
    try {
      chat = AiSdkTextChat.create({ config, env });
    } catch (err) {
      logger.warn('provider.unavailable', errorFields(err));
    }
    const decisions: TextChatProviderSource = () => chat?.forRole(config.attention.decisionModel);

    const lifecycle = new Lifecycle();
    const conversations = new InMemoryConversationStore();
    const personas = new InMemoryPersonaRegistry(
      [{ id: DEFAULT_PERSONA_ID, name: config.persona.name, prompt: config.persona.prompt }],
      DEFAULT_PERSONA_ID,
    );
    const context = new ContextResolver({ conversations, personas });
    const bot = new Bot(telegram.token);
    const outbound = new TelegramOutbound(bot.api);
    const scheduler = new AttentionScheduler({
      config: config.attention,
      gate: new DecisionGate({ providers: decisions }),
      prompts: context,
      history: conversations,
      outbound,
    });
    outbound.onPlainReply(createReplyNotifier({ context, scheduler }));

    return new Harness({
      configPath: loaded.configPath,
      config,
      lifecycle,
      chat,
      conversations,
      context,
      bot,
      outbound,
      scheduler,
    });
  }

  public async startRuntime(): Promise<void> {
    const { bot, chat, context, conversations, lifecycle, outbound, scheduler } = this.boot;

    const shutdown = (reason: string): void => {
      const forceExit = setTimeout(() => process.exit(1), 10_000);
      forceExit.unref();
      this.close({ reason })
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          this.logger.error('shutdown.failed', errorFields(err));
          process.exit(1);
        });
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));

    this.logger.info('runtime.starting', {
      configPath: this.boot.configPath,
      provider: chat ? this.boot.config.model.provider.kind : 'none',
    });
    await runTelegramAdapter({
      bot,
      scheduler,
      outbound,
      context,
      history: conversations,
      providers: () => chat?.forRole('default'),
      signal: lifecycle.signal,
    });
  }

  public async close(opts: { reason: string }): Promise<void> {
    const { bot, lifecycle, scheduler } = this.boot;
    await lifecycle.shutdown({
      reason: opts.reason,
      stop: [{ stop: () => (bot.isRunning() ? bot.stop() : undefined) }],
      drain: [() => scheduler.shutdown()],
    });
  }
}
