// src/chat/dto/chat-request.dto.ts
import { Type } from 'class-transformer';
import {
  IsArray,
  IsBoolean,
  IsIn,
  IsNotEmpty,
  IsOptional,
  IsString,
  Matches,
  MaxLength,
  ValidateNested,
} from 'class-validator';
import { MESSAGE_ROLES, MessageRole } from '../../ai/ai.types';
import { PARTY_ROLES, PartyRole } from '../chat.types';

export class HistoryMessageDto {
  @IsIn(MESSAGE_ROLES)
  role!: MessageRole;

  @IsString()
  content!: string;
}

export class ChatRequestDto {
  @IsString()
  @Matches(/\S/, { message: 'message must not be empty' })
  @MaxLength(20_000)
  message!: string;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(128)
  session_id?: string;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => HistoryMessageDto)
  history?: HistoryMessageDto[];

  @IsOptional()
  @IsIn(PARTY_ROLES)
  role?: PartyRole; // prosecution / victim vs defense / accused

  /** `false` answers right away with `processing`; poll /status/:sessionId. */
  @IsOptional()
  @IsBoolean()
  wait?: boolean;
}
