import path from "node:path"
import { fileURLToPath } from "node:url"

const __filename = fileURLToPath(import.meta.url)
const __dirname = path.dirname(__filename)

// src/ and dist/ both sit one level below the project root.
export const projectRoot = path.resolve(__dirname, "..")

export const paths = {
  configDir: path.join(projectRoot, "config"),
  defaultConfig: path.join(projectRoot, "config", "default.yaml"),
  userConfig: path.join(projectRoot, "config", "config.yaml"),
  dataDir: path.join(projectRoot, "data"),
  subscriptionsDir: path.join(projectRoot, "data", "subscriptions")
}
