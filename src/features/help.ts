/**
 * /start and /help — tell the group what the assistant does.
 */

export function getStartMessage(): string {
  return "Hi! I'm an AI messaging assistant. I filter important messages, answer FAQs, and provide recommendations.";
}

export function getHelpMessage(): string {
  return [
    getStartMessage(),
    '',
    'Commands:',
    '  /addfaq question | answer — teach me an answer',
    '  /faqs — list known questions and how often they were asked',
    '  /setreminder message | YYYY-MM-DD HH:MM — schedule a reminder',
    '  /reminders — list upcoming reminders',
    '  /cancelreminder <id> — cancel a reminder',
    '',
    'Messages mentioning dates, times, events or deadlines are flagged as important.',
    'Ask a question and I will answer it if the group has taught me how.',
  ].join('\n');
}
