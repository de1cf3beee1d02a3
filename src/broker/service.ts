/**
 * Broker Module - Service Layer
 *
 * The coordinator. It alone owns the subscriber sets and repository
 * bindings; everything else talks to it by sending commands, which are
 * drained one at a time from a mailbox. A publish never waits on a
 * consumer: a subscriber whose queue is full is evicted.
 */
import { type Result, err, ok } from "neverthrow";
import type { Event } from "../event/index.js";
import { createLogger, logOperationComplete, logOperationStart } from "../logger.js";
import type { Repository } from "../repository/index.js";
import type { Subscription } from "../subscription/index.js";
import {
  type BrokerError,
  brokerClosed,
  commandFailed,
  formatBrokerError,
} from "./errors.js";
import type {
  BrokerCommand,
  BrokerOptions,
  BrokerStats,
  PublishCommand,
} from "./schema.js";
import { resolveRepository, shouldReplay } from "./transform.js";

const log = createLogger("broker");
const replayLog = createLogger("replay");

type BrokerResult = Result<void, BrokerError>;

type Envelope = {
  readonly command: BrokerCommand;
  readonly done: (result: BrokerResult) => void;
};

export class Broker {
  private readonly replayAll: boolean;

  // Coordinator-owned state. Only `handle` and `processEvictions` touch it.
  private readonly subscribers = new Map<string, Set<Subscription>>();
  private readonly repositories = new Map<string, Repository>();
  private defaultRepository: Repository | null = null;
  private closed = false;

  private readonly mailbox: Envelope[] = [];
  // Unsubscribes the coordinator raises against itself while publishing.
  // Drained at the top of every iteration, never inline.
  private evictions: Subscription[] = [];
  private drainScheduled = false;

  private readonly replays = new Set<Promise<void>>();

  constructor(options: BrokerOptions = {}) {
    this.replayAll = options.replayAll ?? false;
  }

  // ===========================================================================
  // Public operations
  // ===========================================================================

  /**
   * Bind a repository to a channel. Last write wins; null is a no-op.
   */
  registerRepository(
    channel: string,
    repository: Repository | null | undefined,
  ): Promise<BrokerResult> {
    return this.dispatch({ type: "REGISTER_REPOSITORY", channel, repository });
  }

  /**
   * Repository used for channels without their own binding.
   */
  registerDefaultRepository(
    repository: Repository | null | undefined,
  ): Promise<BrokerResult> {
    return this.dispatch({ type: "REGISTER_DEFAULT_REPOSITORY", repository });
  }

  /**
   * Register a subscription. Resolves once the broker has accepted it,
   * so any publish issued afterwards reaches it.
   */
  subscribe(subscription: Subscription): Promise<BrokerResult> {
    return this.dispatch({ type: "SUBSCRIBE", subscription });
  }

  /**
   * Remove a subscription from its channel. Idempotent.
   */
  unsubscribe(subscription: Subscription): Promise<BrokerResult> {
    return this.dispatch({ type: "UNSUBSCRIBE", subscription });
  }

  /**
   * Fan an event out to every subscriber of the named channels.
   */
  publish(channels: ReadonlyArray<string>, event: Event): Promise<BrokerResult> {
    return this.dispatch({ type: "PUBLISH", channels: [...channels], event });
  }

  /**
   * Close every subscription and stop accepting commands. Safe to repeat.
   */
  shutdown(): Promise<BrokerResult> {
    return this.dispatch({ type: "SHUTDOWN" });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  stats(): BrokerStats {
    let subscribers = 0;
    for (const set of this.subscribers.values()) {
      subscribers += set.size;
    }
    return {
      channels: this.subscribers.size,
      subscribers,
      repositories: this.repositories.size,
      hasDefaultRepository: this.defaultRepository !== null,
      activeReplays: this.replays.size,
      closed: this.closed,
    };
  }

  /**
   * Current subscriber count of one channel.
   */
  subscriberCount(channel: string): number {
    return this.subscribers.get(channel)?.size ?? 0;
  }

  /**
   * Resolves once every replay task started so far has finished.
   */
  async replaysSettled(): Promise<void> {
    while (this.replays.size > 0) {
      await Promise.all([...this.replays]);
    }
  }

  // ===========================================================================
  // Mailbox
  // ===========================================================================

  private dispatch(command: BrokerCommand): Promise<BrokerResult> {
    return new Promise((resolve) => {
      this.mailbox.push({ command, done: resolve });
      this.scheduleDrain();
    });
  }

  private scheduleDrain(): void {
    if (this.drainScheduled) {
      return;
    }
    this.drainScheduled = true;
    queueMicrotask(() => this.drain());
  }

  private drain(): void {
    while (this.mailbox.length > 0 || this.evictions.length > 0) {
      this.processEvictions();

      const envelope = this.mailbox.shift();
      if (envelope === undefined) {
        continue;
      }
      envelope.done(this.handleSafely(envelope.command));
    }
    this.drainScheduled = false;
  }

  private handleSafely(command: BrokerCommand): BrokerResult {
    try {
      return this.handle(command);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      const failure = commandFailed(command.type, cause.message, cause);
      log.error({ command: command.type, error: cause.message }, formatBrokerError(failure));
      return err(failure);
    }
  }

  private handle(command: BrokerCommand): BrokerResult {
    if (this.closed) {
      return this.rejectAfterShutdown(command);
    }

    switch (command.type) {
      case "REGISTER_REPOSITORY":
        if (command.repository) {
          this.repositories.set(command.channel, command.repository);
          log.debug({ channel: command.channel }, "Repository registered");
        }
        return ok(undefined);

      case "REGISTER_DEFAULT_REPOSITORY":
        if (command.repository) {
          this.defaultRepository = command.repository;
          log.debug("Default repository registered");
        }
        return ok(undefined);

      case "SUBSCRIBE":
        this.addSubscriber(command.subscription);
        return ok(undefined);

      case "UNSUBSCRIBE":
        this.removeSubscriber(command.subscription);
        return ok(undefined);

      case "PUBLISH":
        this.fanOut(command);
        return ok(undefined);

      case "SHUTDOWN":
        this.closeAll();
        return ok(undefined);
    }
  }

  private rejectAfterShutdown(command: BrokerCommand): BrokerResult {
    switch (command.type) {
      case "SHUTDOWN":
        return ok(undefined);
      case "SUBSCRIBE":
        // Let the connection loop observe end-of-stream
        command.subscription.close();
        return err(brokerClosed(command.type));
      default:
        return err(brokerClosed(command.type));
    }
  }

  // ===========================================================================
  // Subscriber state
  // ===========================================================================

  private addSubscriber(subscription: Subscription): void {
    if (subscription.isClosed) {
      log.debug({ subscriptionId: subscription.id }, "Subscription closed before registration");
      return;
    }

    const set = this.subscribers.get(subscription.channel) ?? new Set<Subscription>();
    set.add(subscription);
    this.subscribers.set(subscription.channel, set);
    subscription.markRegistered();

    log.debug(
      {
        subscriptionId: subscription.id,
        channel: subscription.channel,
        lastEventId: subscription.lastEventId,
        channelSubscribers: set.size,
      },
      "Subscriber registered",
    );

    if (shouldReplay(subscription.lastEventId, this.replayAll)) {
      this.startReplay(subscription);
    }
  }

  private removeSubscriber(subscription: Subscription): void {
    const set = this.subscribers.get(subscription.channel);
    if (!set || !set.delete(subscription)) {
      return;
    }
    if (set.size === 0) {
      this.subscribers.delete(subscription.channel);
    }
    log.debug(
      { subscriptionId: subscription.id, channel: subscription.channel },
      "Subscriber removed",
    );
  }

  private fanOut(command: PublishCommand): void {
    let delivered = 0;
    let evicted = 0;

    for (const channel of command.channels) {
      const set = this.subscribers.get(channel);
      if (!set) {
        continue;
      }
      for (const subscription of set) {
        if (subscription.isClosed) {
          continue;
        }
        const outcome = subscription.offer(command.event);
        if (outcome === "accepted") {
          delivered++;
        } else if (outcome === "full") {
          this.evict(subscription);
          evicted++;
        }
      }
    }

    log.debug(
      { channels: command.channels, kind: command.event.kind, delivered, evicted },
      "Event published",
    );
  }

  /**
   * Close a slow consumer and queue its removal for a later iteration.
   */
  private evict(subscription: Subscription): void {
    subscription.close();
    this.evictions.push(subscription);
    log.warn(
      {
        subscriptionId: subscription.id,
        channel: subscription.channel,
        capacity: subscription.capacity,
      },
      "Slow consumer evicted",
    );
  }

  private processEvictions(): void {
    if (this.evictions.length === 0) {
      return;
    }
    const pending = this.evictions;
    this.evictions = [];
    for (const subscription of pending) {
      this.removeSubscriber(subscription);
    }
  }

  private closeAll(): void {
    const startTime = Date.now();
    logOperationStart(log, "shutdown", { channels: this.subscribers.size });

    let closedCount = 0;
    for (const set of this.subscribers.values()) {
      for (const subscription of set) {
        if (subscription.close()) {
          closedCount++;
        }
      }
    }
    this.subscribers.clear();
    this.evictions = [];
    this.closed = true;

    logOperationComplete(log, "shutdown", startTime, { closedSubscriptions: closedCount });
  }

  // ===========================================================================
  // Replay
  // ===========================================================================

  private startReplay(subscription: Subscription): void {
    const repository = resolveRepository(
      subscription.channel,
      this.repositories,
      this.defaultRepository,
    );
    if (repository === null) {
      replayLog.debug({ channel: subscription.channel }, "No repository bound, replay skipped");
      return;
    }

    const task: Promise<void> = this.runReplay(repository, subscription).finally(() => {
      this.replays.delete(task);
    });
    this.replays.add(task);
  }

  /**
   * Drain the repository's sequence into the queue with the same
   * non-blocking discipline as live publishes. Runs alongside live
   * traffic; the two interleave by arrival.
   */
  private async runReplay(repository: Repository, subscription: Subscription): Promise<void> {
    const context = {
      subscriptionId: subscription.id,
      channel: subscription.channel,
      lastEventId: subscription.lastEventId,
    };
    let replayed = 0;

    try {
      for await (const event of repository.replay(subscription.channel, subscription.lastEventId)) {
        const outcome = subscription.offer(event);
        if (outcome === "closed") {
          replayLog.debug({ ...context, replayed }, "Subscription closed during replay");
          return;
        }
        if (outcome === "full") {
          subscription.close();
          replayLog.warn({ ...context, replayed }, "Slow consumer evicted during replay");
          const removed = await this.unsubscribe(subscription);
          if (removed.isErr()) {
            replayLog.debug({ ...context }, formatBrokerError(removed.error));
          }
          return;
        }
        replayed++;
      }
      replayLog.debug({ ...context, replayed }, "Replay complete");
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      replayLog.warn({ ...context, replayed, error: message }, "Replay source failed");
    }
  }
}
