import { IsNotEmpty, IsString, MaxLength } from 'class-validator';
import { CHAT_MESSAGE_MAX_LENGTH } from './chat-request.dto';

export class AnalyzeQueryDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(CHAT_MESSAGE_MAX_LENGTH)
  message!: string;
}
