import axios, { type AxiosInstance } from 'axios';
import { logger } from '../lib/logger.js';

const log = logger.child('[dialogue]');

export interface DialogueConfig {
  dialogueEngineUrl: string;
  outboundTimeoutMs: number;
}

export type DialogueClient = ReturnType<typeof createDialogueClient>;

// Hands a paused conversation back to the dialogue engine
export function createDialogueClient(config: DialogueConfig, http?: AxiosInstance) {
  const client = http ?? axios.create({ timeout: config.outboundTimeoutMs });

  return {
    get configured(): boolean {
      return Boolean(config.dialogueEngineUrl);
    },

    /** True when the engine accepted the resume; failures are logged, never thrown. */
    async resume(conversationId: string): Promise<boolean> {
      if (!config.dialogueEngineUrl) {
        log.warn('Dialogue engine URL not set, skipping resume', { conversationId });
        return false;
      }
      const url = `${config.dialogueEngineUrl.replace(/\/+$/, '')}/conversations/${encodeURIComponent(conversationId)}/execute`;
      try {
        await client.post(url, { name: 'action_resume_conversation' }, { timeout: config.outboundTimeoutMs });
        log.info('Conversation resumed', { conversationId });
        return true;
      } catch (err) {
        const status = axios.isAxiosError(err) ? err.response?.status : undefined;
        log.error('Failed to resume conversation', err, { conversationId, status });
        return false;
      }
    },
  };
}
