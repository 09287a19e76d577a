export { type AppConfig, appEnvSchema, loadAppConfig, mapEnvToAppConfig } from "./app/config"
export { type CheckAppDeps, createCheckApp } from "./app/create-check-app"
export { run } from "./server/run"
