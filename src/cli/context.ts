/**
 * Builds the account service for a CLI invocation from user configuration.
 */

import type { IRemoteAccountClientFactory } from "../types/index.js";
import { MissingConfigError } from "../types/index.js";
import { ConfigStore } from "../storage/config-store.js";
import { createAccountService } from "../auth/index.js";
import type { AccountService } from "../auth/index.js";
import { HttpAccountClientFactory } from "../remote/http-account-client.js";

function resolveClientFactory(config: ConfigStore): IRemoteAccountClientFactory {
  const serviceUrl = process.env["MASKMAIL_SERVICE_URL"] ?? config.load().serviceUrl;
  if (serviceUrl === undefined || serviceUrl.length === 0) {
    return {
      create: () => {
        throw new MissingConfigError(
          "serviceUrl",
          "Set \"serviceUrl\" in ~/.maskmail/config.json or export MASKMAIL_SERVICE_URL.",
        );
      },
    };
  }
  return new HttpAccountClientFactory(serviceUrl);
}

export function createCliContext(): AccountService {
  const config = new ConfigStore();
  return createAccountService({ config, clientFactory: resolveClientFactory(config) });
}
