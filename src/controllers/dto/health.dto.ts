import { ApiProperty } from "@nestjs/swagger";

export class ActiveSiteDto {
  @ApiProperty({ example: "primary" })
  name!: string;

  @ApiProperty({ example: "https://api.example.com" })
  url!: string;

  @ApiProperty({ enum: ["primary", "backup"], example: "primary" })
  role!: string;

  @ApiProperty({ example: true })
  requiresChallengeSolution!: boolean;
}

export class AccountSummaryDto {
  @ApiProperty({ example: 3 })
  total!: number;

  @ApiProperty({ example: 3 })
  enabled!: number;

  @ApiProperty({ description: "Enabled, healthy and holding an API key", example: 2 })
  eligible!: number;

  @ApiProperty({ description: "Per-account health", type: "array", items: { type: "object" } })
  details!: Record<string, unknown>[];
}

export class HealthResponseDto {
  @ApiProperty({
    description: "unhealthy: no eligible account; degraded: serving from a backup site",
    enum: ["healthy", "degraded", "unhealthy"],
    example: "healthy",
  })
  status!: "healthy" | "degraded" | "unhealthy";

  @ApiProperty({ example: 1703123456789 })
  timestamp!: number;

  @ApiProperty({ description: "Milliseconds since the controller started", example: 3600000 })
  uptime!: number;

  @ApiProperty({ type: ActiveSiteDto })
  activeSite!: ActiveSiteDto;

  @ApiProperty({ description: "Failover snapshot", additionalProperties: true })
  failover!: Record<string, unknown>;

  @ApiProperty({ type: AccountSummaryDto })
  accounts!: AccountSummaryDto;

  @ApiProperty({ description: "Challenge cache state per site", additionalProperties: true })
  cache!: Record<string, unknown>;

  @ApiProperty({ description: "Automation session liveness and statistics", additionalProperties: true })
  session!: Record<string, unknown>;

  @ApiProperty({ description: "Background task state", additionalProperties: true })
  scheduler!: Record<string, unknown>;

  @ApiProperty({ description: "Request router counters", additionalProperties: true })
  gateway!: Record<string, unknown>;

  @ApiProperty({ description: "Client API key validation cache", additionalProperties: true })
  apiKeyValidation!: Record<string, unknown>;

  @ApiProperty({ description: "Last check-in run", additionalProperties: true })
  checkin!: Record<string, unknown>;
}
