import { IsBoolean, IsInt, IsOptional, IsString, IsUUID, Max, MaxLength, Min } from 'class-validator';

export class ChatFeedbackRequestDto {
  @IsUUID()
  sessionId!: string;

  @IsOptional()
  @IsUUID()
  messageId?: string;

  @IsInt()
  @Min(1)
  @Max(5)
  rating!: number;

  @IsOptional()
  @IsString()
  @MaxLength(2000)
  comment?: string;

  @IsOptional()
  @IsBoolean()
  wasHelpful?: boolean;
}
