import { Injectable, UnauthorizedException, type CanActivate, type ExecutionContext } from "@nestjs/common";
import type { Request } from "express";
import { ErrorCode } from "@/common/types/error-handling";
import { ApiKeyValidationService } from "./api-key-validation.service";

@Injectable()
export class ApiKeyGuard implements CanActivate {
  constructor(private readonly validation: ApiKeyValidationService) {}

  async canActivate(context: ExecutionContext): Promise<boolean> {
    if (!this.validation.isEnabled()) return true;

    const request = context.switchToHttp().getRequest<Request>();
    const apiKey = ApiKeyValidationService.extractApiKey(request.headers);
    if (!apiKey) {
      throw new UnauthorizedException({
        code: ErrorCode.UNAUTHORIZED,
        message: "API key is required. Provide x-api-key or Authorization: Bearer <key>",
      });
    }

    const result = await this.validation.validate(apiKey);
    if (!result.valid) {
      throw new UnauthorizedException({
        code: ErrorCode.UNAUTHORIZED,
        message: result.message ?? "Invalid API key",
      });
    }
    return true;
  }
}
