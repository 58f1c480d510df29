export type RunMessageRole = 'user' | 'assistant';

export interface TextContentPart {
  type: 'text';
  text: string;
}

export interface ImageFileContentPart {
  type: 'image_file';
  image_file: { file_id: string; detail?: 'auto' | 'low' | 'high' };
}

export interface ImageUrlContentPart {
  type: 'image_url';
  image_url: { url: string; detail?: 'auto' | 'low' | 'high' };
}

export type MessageContentPart = TextContentPart | ImageFileContentPart | ImageUrlContentPart;

export interface MessageAttachment {
  file_id: string;
  tools: ({ type: 'code_interpreter' } | { type: 'file_search' })[];
}

/** A message added to the thread just before the run starts. */
export interface RunMessage {
  role: RunMessageRole;
  content: string | MessageContentPart[];
  attachments?: MessageAttachment[];
  metadata?: Record<string, string>;
}

export function userMessage(content: string | MessageContentPart[], extra?: Omit<RunMessage, 'role' | 'content'>): RunMessage {
  return { role: 'user', content, ...extra };
}

export function assistantMessage(content: string | MessageContentPart[], extra?: Omit<RunMessage, 'role' | 'content'>): RunMessage {
  return { role: 'assistant', content, ...extra };
}
