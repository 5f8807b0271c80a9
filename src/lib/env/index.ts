export { getEnv, parseEnv, resetEnv, type Env } from "./env";
export { envSchema } from "./schema";
