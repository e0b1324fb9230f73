import { Transform, Type } from 'class-transformer';
import { IsInt, IsOptional, IsString, IsUUID, Max, MaxLength, Min } from 'class-validator';

export class AskDto {
  @IsString()
  @MaxLength(8000)
  query: string = '';

  // multipart forms send '' for an unset field
  @Transform(({ value }) => value || undefined)
  @IsOptional()
  @IsUUID()
  conversationId?: string;
}

export class CreateConversationDto {
  @IsOptional()
  @IsString()
  @MaxLength(120)
  name?: string;
}

export class MessagesQueryDto {
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(1000)
  limit?: number;
}

export interface AskResponse {
  reply: string;
  conversationId: string;
}

export interface CreateConversationResponse {
  conversationId: string;
  welcome: string;
}
