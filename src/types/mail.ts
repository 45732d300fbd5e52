// src/types/mail.ts

export interface MessageHeader {
  name: string;
  value: string;
}

/**
 * One fetched email, reduced to what the scheduler reads
 */
export interface RawMessage {
  id: string;
  headers: MessageHeader[];
}

/**
 * Mail collaborator used by the scheduler
 */
export interface MailService {
  listMessageIds(query: string, limit: number): Promise<string[]>;
  getMessage(id: string): Promise<RawMessage>;
}
