export const NO_QUESTION_MESSAGE = 'No he recibido la pregunta del usuario. Reintenta.';
export const APOLOGY_MESSAGE = 'Lo siento, ocurrió un error al procesar tu consulta.';
export const INSUFFICIENT_INFO_MESSAGE = 'No tengo suficiente información para responder.';

export const DOMAIN_MARKER = 'DOMAIN:';

export const routerPrompt = (document: string, language: string) => `You are the Senior Orchestrator.
Your top priority is to answer using the USER UPLOADED DOCUMENT, if present.
Rules:
1) If the answer is in the document, answer directly and stop.
2) If NOT in the document and need legal/financial knowledge, respond with '${DOMAIN_MARKER}LEGAL' or '${DOMAIN_MARKER}FINANCIAL'.
3) Respond in ${language}.

DOCUMENT:
${document}`;

export const redactorPrompt = (language: string) => `You are the Orchestrator. Rewrite this analysis into natural ${language}.
Be brief, direct. Respond in ${language}.
`;
