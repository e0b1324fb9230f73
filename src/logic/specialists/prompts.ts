import { ChatTurn } from '../chat-memory/types';

export const OUT_OF_SCOPE_MESSAGE =
    'Lo siento, no dispongo de información sobre ese tema. Sólo puedo ayudarte en temas financieros y legales.';

export const EMPTY_QUERY_MESSAGE = 'No he recibido ninguna pregunta.';

const HISTORY_WINDOW = 6;

const SPEAKERS: Record<ChatTurn['role'], string> = {
    user: 'Usuario',
    assistant: 'Asistente',
    system: 'Sistema',
};

export const formatHistory = (messages: readonly ChatTurn[]) =>
    messages
        .slice(-HISTORY_WINDOW)
        .filter(m => m.content.trim())
        .map(m => `${SPEAKERS[m.role]}: ${m.content.trim()}`)
        .join('\n');

export interface SpecialistPromptInput {
    specialty: string;
    knowledgeBase: string;
    language: string;
    history: string;
    document: string;
    context: string;
}

export const specialistPrompt = (p: SpecialistPromptInput) =>
    `Eres un especialista ${p.specialty} experto. RESPONDE usando el DOCUMENTO del usuario, el contexto RAG y, si aplica, la conversacion previa.
Si el usuario pide repetir o aclarar una respuesta previa, responde usando la conversacion.
Si la pregunta es confusa o sin sentido, pide al usuario que la reformule de forma educada.
Si la pregunta esta claramente fuera del ambito legal/financiero, responde exactamente: '${OUT_OF_SCOPE_MESSAGE}'
Si no hay suficiente informacion en el contexto disponible, indicalo y pide mas detalle o un documento.
Responde en ${p.language}, de forma clara y profesional.

CONVERSACION RECIENTE:
${p.history}

DOCUMENTO DEL USUARIO:
${p.document}

CONTEXTO RAG (Base de conocimientos ${p.knowledgeBase}):
${p.context}
`;
