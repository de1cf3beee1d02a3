/**
 * Broker Module - Schemas and Types
 *
 * Commands accepted by the coordinator. Every mutation of subscriber
 * or repository state travels as one of these.
 */
import type { Event } from "../event/index.js";
import type { Repository } from "../repository/index.js";
import type { Subscription } from "../subscription/index.js";

// =============================================================================
// Commands
// =============================================================================

export type RegisterRepositoryCommand = Readonly<{
  type: "REGISTER_REPOSITORY";
  channel: string;
  repository: Repository | null | undefined;
}>;

export type RegisterDefaultRepositoryCommand = Readonly<{
  type: "REGISTER_DEFAULT_REPOSITORY";
  repository: Repository | null | undefined;
}>;

export type SubscribeCommand = Readonly<{
  type: "SUBSCRIBE";
  subscription: Subscription;
}>;

export type UnsubscribeCommand = Readonly<{
  type: "UNSUBSCRIBE";
  subscription: Subscription;
}>;

/**
 * Outbound event: target channels plus the event. Not retained.
 */
export type PublishCommand = Readonly<{
  type: "PUBLISH";
  channels: ReadonlyArray<string>;
  event: Event;
}>;

export type ShutdownCommand = Readonly<{
  type: "SHUTDOWN";
}>;

/**
 * Union of all coordinator commands.
 */
export type BrokerCommand =
  | RegisterRepositoryCommand
  | RegisterDefaultRepositoryCommand
  | SubscribeCommand
  | UnsubscribeCommand
  | PublishCommand
  | ShutdownCommand;

// =============================================================================
// Options / Stats
// =============================================================================

export type BrokerOptions = Readonly<{
  /** Replay history even when a subscription carries no cursor. */
  replayAll?: boolean;
}>;

/**
 * Read-only snapshot of coordinator state.
 */
export type BrokerStats = Readonly<{
  channels: number;
  subscribers: number;
  repositories: number;
  hasDefaultRepository: boolean;
  activeReplays: number;
  closed: boolean;
}>;
