import { ApiProperty } from "@nestjs/swagger";
import { ErrorCode, ErrorSeverity } from "@/common/types/error-handling";

export class ErrorDetailsDto {
  @ApiProperty({
    description: "Error code",
    enum: ErrorCode,
    example: ErrorCode.ALL_ACCOUNTS_EXHAUSTED,
  })
  code!: ErrorCode;

  @ApiProperty({
    description: "Human-readable error message",
    example: "Gave up after 3 attempts",
  })
  message!: string;

  @ApiProperty({
    description: "Error severity level",
    enum: ErrorSeverity,
    example: ErrorSeverity.HIGH,
  })
  severity!: ErrorSeverity;

  @ApiProperty({
    description: "Component the error originated from",
    example: "gateway",
    required: false,
  })
  module?: string;

  @ApiProperty({
    description: "Error timestamp",
    example: 1703123456789,
  })
  timestamp!: number;

  @ApiProperty({
    description: "Additional context, including the last underlying cause",
    additionalProperties: true,
    required: false,
    example: { reason: "all_accounts_exhausted", cause: "[primary] account-level failure for account a (auth_rejected)" },
  })
  context?: Record<string, unknown>;
}

export class HttpErrorResponseDto {
  @ApiProperty({ description: "Always false for errors", example: false })
  success!: false;

  @ApiProperty({ description: "Error details", type: ErrorDetailsDto })
  error!: ErrorDetailsDto;

  @ApiProperty({ description: "Response timestamp", example: 1703123456789 })
  timestamp!: number;

  @ApiProperty({ description: "Request id for tracing", example: "8f14e45f-ceea-4e6b-9c3b-1f5a8e2d7c41" })
  requestId!: string;

  @ApiProperty({ description: "Whether retrying the same request may succeed", example: true })
  retryable!: boolean;

  @ApiProperty({ description: "Suggested retry delay in milliseconds", required: false, example: 30000 })
  retryAfter?: number;
}
