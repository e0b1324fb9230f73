export { Conversation } from './conversation.entity';
export { Message } from './message.entity';
