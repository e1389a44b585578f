import type { CliParameters } from "../domain";
import type { ResolvedSettings } from "../config";
import { redactOptionalString, redactOptionalUrlCredentials } from "../redaction";

/**
 * Produces a shallow copy of the CLI parameters with sensitive fields masked
 * for diagnostic logging.
 */
export function redactCliParameters(parameters: CliParameters): CliParameters {
  return {
    ...parameters,
    targets: parameters.targets.map((target) => redactOptionalUrlCredentials(target) ?? target),
    webhookUrl: redactOptionalUrlCredentials(parameters.webhookUrl),
  };
}

export function redactResolvedSettings(settings: ResolvedSettings): ResolvedSettings {
  return {
    ...settings,
    monitor: {
      ...settings.monitor,
      targets: settings.monitor.targets.map(
        (target) => redactOptionalUrlCredentials(target) ?? target,
      ),
    },
    webhookUrl: redactOptionalUrlCredentials(settings.webhookUrl),
    twilio: {
      accountSid: settings.twilio.accountSid,
      authToken: redactOptionalString(settings.twilio.authToken),
      sender: settings.twilio.sender,
    },
  };
}
