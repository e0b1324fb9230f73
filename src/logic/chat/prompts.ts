export const WELCOME_MESSAGE = "Bienvenido. Por favor indica junto a tu mensaje si tu consulta será 'financiera' o 'legal'.";

export const INTENTS = ['financiera', 'legal'] as const;

export type Intent = typeof INTENTS[number];

export const intentConfirmation = (intent: Intent) =>
    `Intento registrado: '${intent}'. Ahora puedes enviar tu consulta o adjuntar archivos.`;
