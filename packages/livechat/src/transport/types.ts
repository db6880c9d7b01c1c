/**
 * Chat transport contract. The watch loop only talks to a live chat through
 * this interface, so a platform client or an in-memory fake can back it.
 */

/** Who owns the broadcast whose chat should be watched */
export interface IChatOwner {
  channelId?: string;
  /** Video id or a watch/share URL */
  videoId?: string;
}

export interface IRawChatItem {
  id: string;
  authorName: string;
  authorId: string;
  isOwner: boolean;
  isModerator: boolean;
  /** Null for non-text events (super chats without text, membership events, ...) */
  text: string | null;
  publishedAt: string;
}

export interface IChatPage {
  items: IRawChatItem[];
  nextCursor: string | null;
  /** Interval the platform recommends before the next fetch */
  pollingIntervalMs: number | null;
}

export interface IChatTransport {
  readonly name: string;
  /** Longest message the platform accepts */
  readonly maxMessageLength: number;

  /** Active chat id for the owner's current broadcast, or null when not live */
  resolveActiveChatId(owner: IChatOwner, signal?: AbortSignal): Promise<string | null>;

  fetchPage(chatId: string, cursor: string | null, signal?: AbortSignal): Promise<IChatPage>;

  /** True when the platform accepted the message, false when it refused it */
  sendMessage(chatId: string, text: string, signal?: AbortSignal): Promise<boolean>;

  /** The bot's own author id, used to avoid replying to itself */
  resolveSelfIdentity?(signal?: AbortSignal): Promise<string | null>;
}
