import { pipeline } from "stream/promises";
import { All, Controller, PayloadTooLargeException, Req, Res, UseGuards } from "@nestjs/common";
import { ApiOperation, ApiResponse, ApiTags } from "@nestjs/swagger";
import type { Request, Response } from "express";
import { BaseService } from "@/common/base/base.service";
import { describeError } from "@/common/errors/gateway.errors";
import { readBounded } from "@/common/utils/stream.utils";
import { ENV } from "@/config/environment.constants";
import { ApiKeyGuard } from "./api-key.guard";
import { GatewayRouterService, type GatewayRequest } from "./gateway-router.service";

const MAX_REQUEST_BODY_BYTES = 50 * 1024 * 1024;

@ApiTags("Gateway")
@Controller(ENV.APPLICATION.API_PREFIX)
@UseGuards(ApiKeyGuard)
export class GatewayController extends BaseService {
  constructor(private readonly router: GatewayRouterService) {
    super();
  }

  @All("*")
  @ApiOperation({
    summary: "Forward an API request upstream",
    description: "Forwards method, path, query and body to the active site with pooled account credentials",
  })
  @ApiResponse({ status: 401, description: "Missing or invalid client API key" })
  @ApiResponse({ status: 429, description: "No eligible account available" })
  @ApiResponse({ status: 502, description: "All accounts or sites exhausted" })
  @ApiResponse({ status: 503, description: "Challenge solution unavailable" })
  async forward(@Req() req: Request, @Res() res: Response): Promise<void> {
    const body = await readBounded(req, MAX_REQUEST_BODY_BYTES);
    if (body.truncated) {
      throw new PayloadTooLargeException(`Request body exceeds ${MAX_REQUEST_BODY_BYTES} bytes`);
    }

    const queryIndex = req.originalUrl.indexOf("?");
    const request: GatewayRequest = {
      method: req.method,
      path: `/${ENV.APPLICATION.API_PREFIX}/${req.params["0"] ?? ""}`,
      query: queryIndex >= 0 ? req.originalUrl.slice(queryIndex + 1) : undefined,
      headers: req.headers,
      body: body.buffer,
    };

    const result = await this.router.forward(request);

    res.status(result.status);
    for (const [name, value] of Object.entries(result.headers)) {
      res.setHeader(name, value);
    }

    if (Buffer.isBuffer(result.body)) {
      res.end(result.body);
      return;
    }

    try {
      await pipeline(result.body, res);
    } catch (error) {
      // Headers are already sent; the client sees a truncated body
      this.logWarning(
        `Stream from ${result.site} (account ${result.account}) ended early: ${describeError(error)}`,
        request.path
      );
    }
  }
}
