import { fileURLToPath } from "url";
import { loadConfig, validateConfig } from "./infrastructure/config/Config.js";
import { PinoLogger } from "./infrastructure/logging/PinoLogger.js";
import { FilePackagePublisher } from "./infrastructure/publishing/FilePackagePublisher.js";
import { JsonSettingsStore } from "./infrastructure/storage/JsonSettingsStore.js";
import { Configurator } from "./presentation/Configurator.js";
import { HttpServer } from "./presentation/HttpServer.js";

/**
 * Main entry point for the add-on
 */
async function main(): Promise<void> {
  // Load and validate configuration
  const config = loadConfig();
  validateConfig(config);

  const logger = new PinoLogger({
    name: "location-lighting-mode",
    level: config.logging.level,
    pretty: config.logging.pretty,
  });

  logger.info("Location Lighting Mode starting", {
    mode: config.isAddon ? "Home Assistant Add-on" : "Standalone",
    configDir: config.paths.configDir,
    packagePath: config.paths.packagePath,
  });

  const publisher = new FilePackagePublisher(
    {
      configDir: config.paths.configDir,
      packagePath: config.paths.packagePath,
    },
    logger.child({ component: "FilePackagePublisher" })
  );
  const store = new JsonSettingsStore(
    config.paths.dataDir,
    logger.child({ component: "JsonSettingsStore" })
  );

  const configurator = new Configurator(store, publisher, logger.child({ component: "Configurator" }), {
    defaults: config.generator,
  });

  const httpServer = new HttpServer(configurator, logger.child({ component: "HttpServer" }), {
    port: config.http.port,
    host: config.http.host,
  });

  // Handle graceful shutdown
  const shutdown = async (): Promise<void> => {
    logger.info("Shutting down...");
    await httpServer.stop();
    process.exit(0);
  };

  const onSignal = (): void => {
    shutdown().catch((error) => {
      logger.fatal("Shutdown failed", error);
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal);
  process.on("SIGTERM", onSignal);

  try {
    await httpServer.start();
    logger.info(`Configurator available on port ${config.http.port}`);
  } catch (error) {
    logger.fatal("Failed to start", error);
    process.exit(1);
  }
}

// Run only when executed directly, not when imported as a library
if (process.argv[1] === fileURLToPath(import.meta.url)) {
  main().catch((error) => {
    console.error("Unhandled error:", error);
    process.exit(1);
  });
}

// Export for programmatic use
export { Configurator } from "./presentation/Configurator.js";
export { HttpServer } from "./presentation/HttpServer.js";
export { FilePackagePublisher } from "./infrastructure/publishing/FilePackagePublisher.js";
export { JsonSettingsStore } from "./infrastructure/storage/JsonSettingsStore.js";
export { PinoLogger } from "./infrastructure/logging/PinoLogger.js";
export { loadConfig, validateConfig } from "./infrastructure/config/Config.js";
export { parseGeneratorInput } from "./infrastructure/validation/GeneratorInputSchema.js";
export { LightingReactionMapper } from "./infrastructure/mappers/LightingReactionMapper.js";
export { serializePackage } from "./infrastructure/serialization/PackageYamlSerializer.js";
export * from "./domain/index.js";
export * from "./application/index.js";
