import { Transform } from "class-transformer";
import { IsBoolean, IsNotEmpty, IsOptional, IsString } from "class-validator";
import { IsStringRecord } from "@/common/validation/string-record.validator";
import { parseCookieString } from "@/common/utils/cookie.utils";

export class AccountDefinitionDto {
  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsOptional()
  @IsString()
  provider?: string;

  @IsOptional()
  @IsString()
  apiUser?: string;

  @IsOptional()
  @IsString()
  apiKey?: string;

  /** Either an object or a "name=value; name2=value2" string */
  @IsOptional()
  @Transform(({ value }) => (typeof value === "string" ? parseCookieString(value) : value))
  @IsStringRecord()
  cookies?: Record<string, string>;

  @IsOptional()
  @IsBoolean()
  enabled?: boolean;
}
