import { setupUtf8 } from "./utils/log.js"

export async function bootstrap() {
  setupUtf8()
}
