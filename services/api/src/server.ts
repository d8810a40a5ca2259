import { createApp } from "./app.js"
import { loadConfig, type AppConfig } from "../../../src/config.js"
import { OpenAIAdapter } from "../../../infra/openai-adapter.js"
import { ApiJobsClient } from "../../../infra/apijobs-client.js"
import { ConfigError } from "../../../core/domain/errors.js"
import { logError, logEvent } from "../../../src/lib/log.js"

// ---- Config ----
// Both API keys come from the environment; a missing key stops the process here.
function start(): void {
  let config: AppConfig
  try {
    config = loadConfig()
  } catch (e) {
    if (e instanceof ConfigError) {
      logError("config_error", { err: e.message })
      process.exitCode = 1
      return
    }
    throw e
  }

  const llm = new OpenAIAdapter({
    apiKey: config.openaiApiKey,
    baseUrl: config.openaiBaseUrl,
    model: config.openaiModel,
    timeoutMs: config.requestTimeoutMs,
  })

  const jobs = new ApiJobsClient({
    apiKey: config.apiJobsApiKey,
    baseUrl: config.apiJobsBaseUrl,
    timeoutMs: config.requestTimeoutMs,
    remoteLocation: config.queryDefaults.location,
  })

  // ---- App ----
  const app = createApp({
    llm,
    jobs,
    maxInputChars: config.maxInputChars,
    maxUploadBytes: config.maxUploadBytes,
    queryDefaults: config.queryDefaults,
  })

  const port = config.port
  app.listen(port, () => logEvent("api_listening", { port, model: config.openaiModel }))
}

start()
