import type { CodeLanguage, FormattingStyle } from '../domain/schemas';

const LANGUAGE_NAMES: Record<string, string> = {
  en: 'English',
  ru: 'Russian',
  de: 'German',
  fr: 'French',
  es: 'Spanish',
};

export const describeLanguage = (code: string) => LANGUAGE_NAMES[code] ?? code;

const languageClause = (language?: string) =>
  language
    ? `The text is in ${describeLanguage(language)}. Keep it in ${describeLanguage(language)} and never translate it.`
    : 'Keep the text in its original language and never translate it.';

const STRUCTURED_PROMPT =
  'Turn the dictated text into a well-structured document. Fix grammar and punctuation, group related ideas into paragraphs, and use headings, bullet lists or numbered lists where they help. Return only the formatted text without explanations.';

const CONDENSED_PROMPT =
  'Rewrite the dictated text as a short chat message. Remove filler words, hesitations and repetitions, keep the wording casual and terse, and do not end the message with punctuation. Return only the message without explanations.';

export interface CleanupPromptOptions {
  style: FormattingStyle;
  /** Used for the standard style. */
  standardPrompt: string;
  language?: string;
  terminology?: readonly string[];
}

export const buildCleanupPrompt = (options: CleanupPromptOptions) => {
  const base =
    options.style === 'structured'
      ? STRUCTURED_PROMPT
      : options.style === 'condensed'
        ? CONDENSED_PROMPT
        : options.standardPrompt;
  const parts = [base, languageClause(options.language)];
  if (options.terminology?.length) {
    parts.push(
      `The speaker uses these terms; when a word sounds like one of them, spell it exactly as listed: ${options.terminology.join(', ')}.`
    );
  }
  return parts.join('\n\n');
};

export const ASK_SYSTEM_PROMPT = [
  'You are a helpful voice assistant. The user speaks to you via voice, and you answer their questions.',
  'Answer concisely and helpfully. Use markdown formatting for better readability (bold, lists, tables, code blocks, etc.).',
  "Match the language of the user's message.",
].join('\n');

export const RESPOND_SYSTEM_PROMPT = [
  'You write replies on behalf of the user.',
  'You are given a message the user received (when available) and the user\'s spoken instructions on how to respond.',
  'Do not answer the instructions, do not analyze or summarize the message, and do not add commentary.',
  'Output only the reply text, ready to be sent as is, in the language of the message being answered (or of the instructions when there is no message).',
].join('\n');

const CODE_LANGUAGE_CLAUSE: Record<CodeLanguage, string> = {
  auto: 'Choose the most fitting programming language for the request.',
  python: 'Write the code in Python.',
  bash: 'Write the code as a Bash script or one-liner.',
};

export const buildCodeSystemPrompt = (language: CodeLanguage) =>
  [
    'You are a code generator.',
    CODE_LANGUAGE_CLAUSE[language],
    'Output only the code. No explanations, no prose, and no markdown code fences.',
    'Comments inside the code are allowed when they are essential.',
  ].join('\n');

export const PROCESS_SYSTEM_PROMPT = [
  'You process content the user copied according to their spoken command.',
  'Apply the command to the content and output only the result, without explanations or preamble.',
].join('\n');

export const PROCESS_IMAGE_SYSTEM_PROMPT = [
  'You process an image the user copied according to their spoken command.',
  'Follow the command and output only the result, without explanations or preamble.',
].join('\n');

export const buildRespondMessage = (instructions: string, message?: string) => {
  const sections: string[] = [];
  if (message !== undefined) sections.push(`Message to respond to:\n${message}`);
  sections.push(`How to respond:\n${instructions}`);
  return sections.join('\n\n');
};

export const buildCodeMessage = (request: string) => `Generate code: ${request}`;

export const buildProcessMessage = (content: string, command: string) =>
  `Content to process:\n${content}\n\nCommand:\n${command}`;
