/**
 * FAQ — per-group question/answer knowledge base.
 *
 * Every question the bot sees is looked up by exact (case-insensitive)
 * match. Unknown questions are recorded as pending so admins can answer
 * them later with `/addfaq question | answer`, which upserts over the
 * pending row and keeps its ask count.
 */

import { logger } from '../middleware/logger.js';
import { PENDING_ANSWER, type FaqEntry, type KnowledgeStore } from '../utils/db.js';
import { UsageError } from '../utils/errors.js';

export const ADD_FAQ_USAGE = 'Usage: /addfaq question | answer';

export type FaqLookup =
  | { status: 'answered'; answer: string; frequency: number }
  | { status: 'pending'; frequency: number }
  | { status: 'unknown' };

export interface FaqService {
  /** Look up a question; an unseen one is stored as pending. */
  handleQuestion(groupId: string, question: string): Promise<FaqLookup>;
  registerFaq(groupId: string, question: string, answer: string): Promise<FaqEntry>;
  listFaqs(groupId: string): Promise<FaqEntry[]>;
}

export function createFaqService(store: KnowledgeStore): FaqService {
  return {
    async handleQuestion(groupId, question) {
      const hit = await store.lookupFaq(groupId, question);

      if (!hit) {
        await store.insertFaq(groupId, question, PENDING_ANSWER, 1);
        logger.info({ groupId, question }, 'Registered pending FAQ');
        return { status: 'unknown' };
      }

      if (hit.answer === PENDING_ANSWER) {
        return { status: 'pending', frequency: hit.frequency };
      }

      return { status: 'answered', answer: hit.answer, frequency: hit.frequency };
    },

    async registerFaq(groupId, question, answer) {
      const entry = await store.insertFaq(groupId, question, answer, 1);
      logger.info({ groupId, faqId: entry.id }, 'FAQ registered');
      return entry;
    },

    listFaqs: (groupId) => store.listFaqs(groupId),
  };
}

/** Split `/addfaq` arguments into question and answer. */
export function parseAddFaqArgs(args: string): { question: string; answer: string } {
  const parts = args.split('|');
  if (parts.length !== 2) throw new UsageError(ADD_FAQ_USAGE);

  const question = parts[0].trim();
  const answer = parts[1].trim();
  if (!question || !answer) throw new UsageError(ADD_FAQ_USAGE);

  return { question, answer };
}

/** Check whether a sender may register FAQs. An empty admin list allows everyone. */
export function canRegisterFaq(senderId: string, adminIds: readonly string[]): boolean {
  return adminIds.length === 0 || adminIds.includes(senderId);
}

export function formatFaqList(entries: FaqEntry[]): string {
  if (entries.length === 0) return 'No FAQs stored for this group yet.';

  const lines = [`📚 FAQs (${entries.length})`, ''];
  for (const entry of entries) {
    const answer = entry.answer === PENDING_ANSWER ? '⏳ pending' : entry.answer;
    lines.push(`• ${entry.question} → ${answer} (asked ${entry.frequency}×)`);
  }
  return lines.join('\n');
}
