export { getEnv, parseEnv, type Env } from "./env";
export { envSchema } from "./schema";
