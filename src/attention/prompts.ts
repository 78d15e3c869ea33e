export const DECISION_JSON_SHAPE = '{"should_reply": boolean, "reply_content": "string"}';

export const buildInterjectionPrompt = (lines: readonly string[]): string =>
  [
    'You are in a group chat. These are the most recent messages:',
    '--- chat log start ---',
    ...lines,
    '--- chat log end ---',
    '',
    'Decide whether you should join the discussion. Base the decision on:',
    '1. Is the topic related to your knowledge or your persona?',
    '2. Would your reply add value (information, help, fun)?',
    '3. Is the conversation at a point where joining in makes sense?',
    '',
    'Answer strictly in this JSON format and add no explanation:',
    DECISION_JSON_SHAPE,
  ].join('\n');

export const buildFollowUpPrompt = (opts: {
  readonly senderName: string;
  readonly text: string;
}): string =>
  [
    `You replied to ${opts.senderName.trim() || 'someone'} in this group chat a moment ago.`,
    'Without addressing you directly, they just wrote:',
    '--- message start ---',
    opts.text,
    '--- message end ---',
    '',
    'If this continues your conversation with them, reply as you normally would.',
    'If it is meant for someone else or needs no answer, stay quiet.',
    '',
    'Answer strictly in this JSON format and add no explanation:',
    DECISION_JSON_SHAPE,
  ].join('\n');
