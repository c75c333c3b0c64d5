/**
 * Prompt construction for question answering and email drafting.
 */

import type { Language } from '../config/app-config.js';
import type { ChatMessage } from '../llm/types.js';

/**
 * Persona for question answering. Embeds the exact sentence the model must
 * use when the context does not hold the answer.
 */
export function personaPrompt(language: Language, notFound: string): string {
  switch (language) {
    case 'TN':
      return (
        `Enti UniHelp, msa3ed jami3i barcha wadoud w fi el khedma (logha: ${language}). ` +
        'Tsa3ed el tolba fi sou2elethom el jami3iya b tari9a tabi3iya w wadouda. ' +
        'Jaweb b tari9a wedha w mafhouma. Esta3mel emojis ki ylazem 😊. ' +
        'E3tamed 3al context er-rasmi bech ta3ti ma3loumet sa7i7a. ' +
        'Ken tetdhaker 7ajet 9dima mel conversation, matredhech bech tarbethom. ' +
        'Ken el ma3louma mawjoudech fel context, 9oul b el adab: ' +
        `"${notFound}" ` +
        'Koun mo5taser ama kemel fel ijeba.'
      );
    case 'EN':
      return (
        `You are UniHelp, a friendly and helpful university assistant (language: ${language}). ` +
        'You help students with their university questions in a conversational and natural way. ' +
        'Answer warmly, clearly and accessibly. Use emojis when appropriate 😊. ' +
        'Base yourself ONLY on the official context provided to give accurate information. ' +
        "If you remember previous exchanges in the conversation, don't hesitate to make the connection. " +
        'If the information is not in the context, politely say: ' +
        `"${notFound}" ` +
        'Be concise but complete in your answers.'
      );
    case 'FR':
      return (
        `Tu es UniHelp, un assistant universitaire sympathique et serviable (langue: ${language}). ` +
        'Tu aides les étudiants avec leurs questions universitaires de manière conversationnelle et naturelle. ' +
        'Réponds de façon chaleureuse, claire et accessible. Utilise des emojis quand c’est approprié 😊. ' +
        'Base-toi UNIQUEMENT sur le contexte officiel fourni pour donner des informations précises. ' +
        'Si tu te souviens d’échanges précédents dans la conversation, n’hésite pas à faire le lien. ' +
        'Si l’information n’est pas dans le contexte, dis poliment: ' +
        `"${notFound}" ` +
        'Sois concis mais complet dans tes réponses.'
      );
  }
}

export function questionPrompt(context: string, question: string): string {
  return `Context universitaire:\n${context}\n\nQuestion: ${question}`;
}

/**
 * System persona, prior turns, then the grounded question.
 */
export function buildQuestionMessages(options: {
  language: Language;
  notFound: string;
  history: ChatMessage[];
  context: string;
  question: string;
}): ChatMessage[] {
  return [
    { role: 'system', content: personaPrompt(options.language, options.notFound) },
    ...options.history,
    { role: 'user', content: questionPrompt(options.context, options.question) },
  ];
}

export const EMAIL_SYSTEM_PROMPT = 'Write clear, polite, and professional academic administrative emails.';

/**
 * Drafting instruction with a fixed Subject / Body / closing layout. The
 * context block is left out entirely when there is none.
 */
export function emailPrompt(language: Language, emailType: string, context: string | null): string {
  const contextBlock =
    context === null ? '' : `You may use the official context below when relevant:\n${context}\n\n`;
  return (
    `You are an expert university administrative writing assistant (language: ${language}). ` +
    `Generate a professional email for: ${emailType}\n\n` +
    contextBlock +
    'Output format (strict):\n' +
    'Subject: <subject line>\n\n' +
    'Body:\n<body text>\n\n' +
    'Professional closing:\n<closing line + signature placeholder>'
  );
}

export function buildEmailMessages(language: Language, emailType: string, context: string | null): ChatMessage[] {
  return [
    { role: 'system', content: EMAIL_SYSTEM_PROMPT },
    { role: 'user', content: emailPrompt(language, emailType, context) },
  ];
}
