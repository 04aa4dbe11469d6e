import { IsDefined, IsInt, IsNotEmpty, IsOptional, IsString } from 'class-validator';

/**
 * Response envelope published by an action executor.
 * Unknown fields are ignored; the listed required fields must be present.
 */
export class ActionResponseMessageDto {
  @IsString()
  @IsNotEmpty()
  id!: string;

  @IsString()
  @IsNotEmpty()
  created_by!: string;

  @IsString()
  @IsNotEmpty()
  message_type!: string;

  @IsDefined()
  payload!: unknown;

  @IsOptional()
  @IsString()
  status?: string;

  @IsOptional()
  @IsString()
  correlation_id?: string;

  @IsOptional()
  @IsString()
  created_date?: string;

  @IsOptional()
  @IsString()
  stage?: string;

  @IsOptional()
  @IsInt()
  retry_count?: number;
}
