import { ApiProperty } from "@nestjs/swagger";

export class OperationResultDto {
  @ApiProperty({ example: true })
  success!: boolean;

  @ApiProperty({ example: "Challenge cookies refreshed for primary" })
  message!: string;

  @ApiProperty({ required: false, additionalProperties: true })
  data?: Record<string, unknown>;
}
