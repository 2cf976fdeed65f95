import { IsNotEmpty, IsOptional, IsString, MaxLength } from "class-validator";

/** Gateway callback, posted as form fields or JSON */
export class UssdCallbackDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(100)
  sessionId!: string;

  @IsString()
  @IsNotEmpty()
  @MaxLength(20)
  phoneNumber!: string;

  @IsOptional()
  @IsString()
  @MaxLength(1000)
  text?: string;

  @IsOptional()
  @IsString()
  serviceCode?: string;

  @IsOptional()
  @IsString()
  networkCode?: string;
}
