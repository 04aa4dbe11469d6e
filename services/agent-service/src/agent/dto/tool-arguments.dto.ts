import {
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  IsUrl,
  MaxLength,
} from 'class-validator';

/**
 * Arguments of the request_web_action tool, as produced by the model
 */
export class WebActionArgumentsDto {
  @IsUrl({ require_tld: false })
  url!: string;

  @IsString()
  @IsNotEmpty()
  operation!: string;

  @IsOptional()
  @IsObject()
  arguments?: Record<string, unknown>;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  secret_name?: string;

  @IsOptional()
  @IsUrl({ require_tld: false })
  token_url?: string;
}

export class NotificationArgumentsDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(4000)
  message!: string;
}
