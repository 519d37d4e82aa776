import { AsyncLocalStorage } from "node:async_hooks";
import * as Sentry from "@sentry/node";
import { getWorkspaceConfig } from "./config";
import { commonLogger } from "./logger";

const SENTRY_DSN_ENV = "BXP_SENTRY_DSN";
const FLUSH_TIMEOUT_MS = 2000;

/**
 * Error reporting class that is responsible for capturing and sending errors to Sentry.
 *
 * The client is created on first use, after the configuration file has been loaded.
 * Avoid using this class directly, instead use the `errorReporting` instance.
 */
class SentryErrorReporting {
  private dsn: string | undefined;
  private isEnabled = false;
  private client: Sentry.NodeClient | undefined;
  private globalScope: Sentry.Scope = new Sentry.Scope();

  private asyncScopeStorage = new AsyncLocalStorage<Sentry.Scope>();

  setup() {
    // By default error reporting is disabled. To enable it, set the `system.enableSentry`
    // to `true` in the configuration file and export BXP_SENTRY_DSN.
    this.isEnabled = getWorkspaceConfig("system.enableSentry") ?? false;
    this.dsn = process.env[SENTRY_DSN_ENV];
    this.client = new Sentry.NodeClient({
      dsn: this.dsn,
      enabled: this.isEnabled && this.dsn !== undefined,
      tracesSampleRate: 1.0,
      stackParser: Sentry.defaultStackParser,
      transport: Sentry.makeNodeTransport,
      integrations: [],
    });
    this.globalScope.setClient(this.client);

    commonLogger.debug("Sentry setup", {
      sentryDsn: this.dsn ?? "<not set>",
      sentryIsEnabled: this.isEnabled,
    });
  }

  get currentScope(): Sentry.Scope {
    return this.asyncScopeStorage.getStore() ?? this.globalScope;
  }

  async captureException(error: unknown): Promise<void> {
    this.currentScope.captureException(error);
    if (this.client) {
      await this.client.flush(FLUSH_TIMEOUT_MS);
    }
  }

  addBreadcrumb(breadcrumb: Sentry.Breadcrumb): void {
    this.currentScope.addBreadcrumb(breadcrumb);
  }

  withScope<T>(callback: (scope: Sentry.Scope) => T): T {
    const scope = this.currentScope.clone();
    return this.asyncScopeStorage.run(scope, () => callback(scope));
  }
}

export const errorReporting = new SentryErrorReporting();
