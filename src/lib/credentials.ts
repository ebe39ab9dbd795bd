// src/lib/credentials.ts
import { ConfigError } from "./errors";

export const USERNAME_ENV = "METEOMATICS_USERNAME";
export const PASSWORD_ENV = "METEOMATICS_PASSWORD";

export type Credentials = { username: string; password: string };

export function getCredentials(
  usernameArg: string | undefined,
  passwordArg: string | undefined,
  env: NodeJS.ProcessEnv = process.env
): Credentials {
  const username = usernameArg || env[USERNAME_ENV];
  const password = passwordArg || env[PASSWORD_ENV];
  if (!username || !password) {
    throw new ConfigError(
      `Missing credentials. Set ${USERNAME_ENV} and ${PASSWORD_ENV} environment variables or pass --username/--password.`
    );
  }
  return { username, password };
}
