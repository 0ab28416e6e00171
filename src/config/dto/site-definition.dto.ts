import { Type } from "class-transformer";
import {
  ArrayMinSize,
  IsArray,
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUrl,
  Matches,
  Min,
  ValidateNested,
} from "class-validator";
import type { SiteRole } from "@/common/types/gateway";

export class SiteDefinitionDto {
  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsUrl({ require_protocol: true, require_tld: false, protocols: ["http", "https"] })
  url!: string;

  @IsIn(["primary", "backup"])
  role!: SiteRole;

  @IsBoolean()
  requiresProxy!: boolean;

  @IsBoolean()
  requiresChallengeSolution!: boolean;

  @IsOptional()
  @IsInt()
  @Min(0)
  priority?: number;

  @IsOptional()
  @IsString()
  @Matches(/^\//, { message: "challengePath must start with /" })
  challengePath?: string;

  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  requiredCookies?: string[];
}

export class SitesFileDto {
  @IsArray()
  @ArrayMinSize(1)
  @ValidateNested({ each: true })
  @Type(() => SiteDefinitionDto)
  sites!: SiteDefinitionDto[];
}
