import { Domain } from '../specialists/types';

export const TOPIC_KEYWORDS: Record<Domain, readonly string[]> = {
    financial: [
        'financ', 'financial', 'financiero', 'finanzas', 'banco', 'invers',
        'contab', 'crédito', 'hipote', 'impuest', 'iva', 'amortiz',
    ],
    legal: [
        'legal', 'contrato', 'demanda', 'ley', 'juríd', 'abogado',
        'testamento', 'acuerdo', 'litigio', 'arrend',
    ],
};

/** Case-insensitive substring match against both keyword lists. */
export function mentionsTopic(query: string): boolean {
    const q = query.toLowerCase();
    return Object.values(TOPIC_KEYWORDS).some(words => words.some(k => q.includes(k)));
}
