/**
 * Transport-neutral inbound room message.
 */
export interface InboundMessage {
  roomId: string;
  sender: string;
  eventId?: string;
  /** eg `m.text`, `m.notice`, `m.image` */
  msgtype: string;
  body: string;
}
