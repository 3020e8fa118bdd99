/**
 * Outbound messaging. Implementations throw ChannelError, with kind
 * "transient" for failures worth retrying and "permanent" when the
 * recipient cannot be reached at all.
 */
export interface MessagingChannel {
  sendMessage(userId: number, text: string): Promise<void>;
}
