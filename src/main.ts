import "reflect-metadata";
import * as dotenv from "dotenv";
dotenv.config();

import helmet from "helmet";
import { NestFactory } from "@nestjs/core";
import { ValidationPipe, type INestApplication } from "@nestjs/common";
import { DocumentBuilder, SwaggerModule, type SwaggerDocumentOptions } from "@nestjs/swagger";
import { FilteredLogger } from "@/common/logging/filtered-logger";
import { EnhancedLoggerService } from "@/common/logging/enhanced-logger.service";
import { HttpExceptionFilter } from "@/common/filters/http-exception.filter";
import { AppModule } from "@/app.module";
import { ENV, ENV_HELPERS } from "@/config/environment.constants";

// Global application instance for graceful shutdown
let app: INestApplication | null = null;
let logger: FilteredLogger | null = null;
let enhancedLogger: EnhancedLoggerService | null = null;

async function bootstrap(): Promise<void> {
  const operationId = `bootstrap_${Date.now()}`;

  try {
    logger = new FilteredLogger("Bootstrap", ENV.LOGGING.LOG_LEVEL);
    enhancedLogger = new EnhancedLoggerService("Bootstrap");
    enhancedLogger.startPerformanceTimer(operationId, "application_bootstrap", "Bootstrap");

    const appCreationStart = performance.now();
    app = await NestFactory.create(AppModule, {
      // Request bodies are forwarded upstream byte for byte
      bodyParser: false,
      logger: new FilteredLogger("Nest", ENV.LOGGING.LOG_LEVEL),
      abortOnError: false,
    });

    enhancedLogger.log(`NestJS application created in ${(performance.now() - appCreationStart).toFixed(2)}ms`, {
      component: "Bootstrap",
      operation: "create_nestjs_app",
    });

    enhancedLogger.logCriticalOperation("application_startup", "Bootstrap", {
      nodeVersion: process.version,
      platform: process.platform,
      pid: process.pid,
      environment: ENV.APPLICATION.NODE_ENV,
      logLevel: ENV.LOGGING.LOG_LEVEL,
    });

    app.use(
      helmet({
        contentSecurityPolicy: {
          directives: {
            defaultSrc: ["'self'"],
            styleSrc: ["'self'", "'unsafe-inline'"],
            scriptSrc: ["'self'"],
            imgSrc: ["'self'", "data:", "https:"],
          },
        },
        crossOriginEmbedderPolicy: false,
      })
    );

    app.useGlobalPipes(
      new ValidationPipe({
        whitelist: true,
        forbidNonWhitelisted: true,
        transform: true,
        disableErrorMessages: ENV_HELPERS.isProduction(),
      })
    );
    app.useGlobalFilters(new HttpExceptionFilter());

    const basePath = ENV.APPLICATION.BASE_PATH;
    if (basePath) {
      app.setGlobalPrefix(basePath);
    }
    setupSwaggerDocumentation(app, basePath);

    setupGracefulShutdown();

    const port = ENV.APPLICATION.PORT;
    await app.listen(port, "0.0.0.0");

    enhancedLogger.logCriticalOperation("http_server_started", "Bootstrap", {
      port,
      basePath,
      apiPrefix: ENV.APPLICATION.API_PREFIX,
    });
    enhancedLogger.endPerformanceTimer(operationId, true, { port });
  } catch (error) {
    const errObj = error instanceof Error ? error : new Error(String(error));

    if (enhancedLogger) {
      enhancedLogger.error(errObj, {
        component: "Bootstrap",
        operation: "application_startup",
        severity: "critical",
      });
      enhancedLogger.endPerformanceTimer(operationId, false, { error: errObj.message });
    } else if (logger) {
      logger.error("Application startup failed:", errObj.stack, errObj.message);
    }

    if (app) {
      try {
        await app.close();
      } catch (closeError) {
        logger?.error("Application cleanup failed:", String(closeError));
      }
    }

    process.exit(1);
  }
}

function setupSwaggerDocumentation(app: INestApplication, basePath: string): void {
  const config = new DocumentBuilder()
    .setTitle("Challenge Gateway API")
    .setDescription(
      "Forwards API requests to an upstream protected by an anti-bot challenge, " +
        "rotating across a pool of accounts and failing over between sites."
    )
    .setVersion("1.0.0")
    .addTag("Gateway", "Requests forwarded upstream under the API prefix")
    .addTag("System Health", "Gateway, site, account and session status")
    .addTag("Operations", "Operator actions: challenge refresh, session restart, site switching, reloads")
    .build();

  const options: SwaggerDocumentOptions = {
    operationIdFactory: (_controllerKey: string, methodKey: string) => methodKey,
  };

  const document = SwaggerModule.createDocument(app, config, options);
  SwaggerModule.setup(`${basePath}/api-docs`, app, document);
  logger?.log("API documentation configured");
}

function setupGracefulShutdown(): void {
  let isShuttingDown = false;

  for (const signal of ["SIGTERM", "SIGINT"] as const) {
    process.on(signal, () => {
      if (isShuttingDown) {
        logger?.log(`Received ${signal} during shutdown, ignoring...`);
        return;
      }
      isShuttingDown = true;
      logger?.log(`Received ${signal}, starting graceful shutdown...`);

      gracefulShutdown().then(
        () => process.exit(0),
        (error: unknown) => {
          logger?.error(`Error during ${signal} shutdown:`, String(error));
          process.exit(1);
        }
      );
    });
  }

  process.on("unhandledRejection", reason => {
    logger?.error(`Unhandled Rejection: ${String(reason)}`);
  });
}

async function gracefulShutdown(): Promise<void> {
  if (!app) return;

  const timeoutMs = ENV.TIMEOUTS.GRACEFUL_SHUTDOWN_MS;
  const shutdownTimeout = setTimeout(() => {
    logger?.error(`Shutdown timeout reached after ${timeoutMs}ms, forcing exit`);
    process.exit(1);
  }, timeoutMs);

  const startedAt = Date.now();
  try {
    // Triggers onModuleDestroy: timers, cron job and the automation session
    await app.close();
    app = null;
    logger?.log(`Graceful shutdown completed in ${Date.now() - startedAt}ms`);
  } finally {
    clearTimeout(shutdownTimeout);
  }
}

void bootstrap();
