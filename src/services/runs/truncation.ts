export type TruncationStrategy =
  | { readonly type: 'auto' }
  | { readonly type: 'last_messages'; readonly lastMessages: number };

export type TruncationStrategyBody =
  | { type: 'auto' }
  | { type: 'last_messages'; last_messages: number };

export const TruncationStrategies = {
  /** Let the service drop messages from the middle of the thread to fit the context window. */
  auto(): TruncationStrategy {
    return { type: 'auto' };
  },

  /** Keep only the most recent `count` messages. */
  lastMessages(count: number): TruncationStrategy {
    return { type: 'last_messages', lastMessages: count };
  },
} as const;

export function encodeTruncationStrategy(strategy: TruncationStrategy): TruncationStrategyBody {
  return strategy.type === 'auto'
    ? { type: 'auto' }
    : { type: 'last_messages', last_messages: strategy.lastMessages };
}

export function decodeTruncationStrategy(body: TruncationStrategyBody): TruncationStrategy {
  return body.type === 'auto'
    ? TruncationStrategies.auto()
    : TruncationStrategies.lastMessages(body.last_messages);
}
