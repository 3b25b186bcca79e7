import type { AxiosInstance } from "axios";
import { RESERVED_PATHS, SESSION_DEFAULTS } from "../config/graph-config.ts";
import {
  GraphSessionError,
  type GraphSessionErrorCode,
} from "../utils/error-util.ts";
import {
  normalizeGraphEvent,
  type NormalizedGraphEvent,
} from "../utils/response-normalizer-util.ts";
import { redactToken } from "../utils/sanitizer-util.ts";
import {
  createStructuredLogger,
  resolveServiceLogger,
  type ServiceLogger,
} from "./logger-service.ts";
import { SimulatorGraphBinding } from "./simulator-binding.ts";
import type {
  GraphBinding,
  GraphHttpMethod,
  GraphParams,
  GraphSessionSettings,
  PendingRequest,
  RawGraphEvent,
  ResponseEventListener,
} from "../types.ts";

export interface GraphSessionDependencies {
  settings: GraphSessionSettings;
  binding: GraphBinding;
  logger?: ServiceLogger;
}

export interface GraphSessionOptions {
  settings: GraphSessionSettings;
  /** Native SDK integration. Required when `environment` is `"device"`. */
  binding?: GraphBinding;
  logger?: ServiceLogger;
  /** HTTP client used by the simulator binding. */
  http?: AxiosInstance;
}

export function isAppIdDefined(appId: string): boolean {
  return appId.length > 0 && appId !== SESSION_DEFAULTS.APP_ID;
}

function describePendingRequest(
  request: PendingRequest,
): Record<string, unknown> {
  if (request.path === RESERVED_PATHS.LOGIN) {
    return { path: request.path, permissions: request.params };
  }

  return {
    path: request.path,
    method: request.method,
    params: request.params,
  };
}

/**
 * Owns the logged-in flag and the single pending-request slot, and turns
 * every binding event into one normalized listener call.
 * Usage errors are thrown synchronously and never reach the listener.
 */
export class GraphSession {
  private loggedIn = false;
  private pendingRequest: PendingRequest | null = null;
  private readonly settings: GraphSessionSettings;
  private readonly binding: GraphBinding;
  private readonly logger: Required<ServiceLogger>;

  constructor(dependencies: GraphSessionDependencies) {
    this.settings = dependencies.settings;
    this.binding = dependencies.binding;
    this.logger = resolveServiceLogger(
      dependencies.logger,
      createStructuredLogger({
        shouldLogDebug: () => this.settings.isDebug,
      }),
    );
  }

  isLoggedIn(): boolean {
    return this.loggedIn;
  }

  hasPendingRequest(): boolean {
    return this.pendingRequest !== null;
  }

  login(
    permissions: readonly string[],
    listener: ResponseEventListener,
  ): Promise<void> {
    this.logger.debug("Preparing to log in");

    if (!isAppIdDefined(this.settings.appId)) {
      throw this.usageError(
        "APP_ID_MISSING",
        "Facebook FB_App_ID not defined by caller",
      );
    }
    this.assertNoPendingRequest("Error processing Facebook login");

    this.pendingRequest = {
      path: RESERVED_PATHS.LOGIN,
      params: permissions,
      listener,
    };

    return this.dispatch(() =>
      this.binding.login(this.settings.appId, this.handleEvent, permissions)
    );
  }

  request(
    path: string,
    method: GraphHttpMethod,
    params: GraphParams | undefined,
    listener: ResponseEventListener,
  ): Promise<void> {
    this.logger.debug(`Preparing to send request: ${method} ${path}`);

    const context = `Error processing Facebook request: ${method} ${path}`;
    this.assertNoPendingRequest(context);
    this.assertLoggedIn(context);

    this.pendingRequest = { path, method, params, listener };

    return this.dispatch(() =>
      this.binding.request(path, method, params ?? {})
    );
  }

  showDialog(
    params: GraphParams,
    listener: ResponseEventListener,
  ): Promise<void> {
    this.logger.debug("Preparing to show dialog");

    const context = "Error processing Facebook show dialog";
    this.assertNoPendingRequest(context);
    this.assertLoggedIn(context);

    this.pendingRequest = {
      path: RESERVED_PATHS.SHOW_DIALOG,
      params,
      listener,
    };

    return this.dispatch(() => this.binding.showDialog(params));
  }

  logout(listener: ResponseEventListener): Promise<void> {
    this.logger.debug("Preparing to log out");

    const context = "Error processing Facebook logout";
    this.assertNoPendingRequest(context);
    this.assertLoggedIn(context);

    this.pendingRequest = {
      path: RESERVED_PATHS.LOGOUT,
      params: undefined,
      listener,
    };

    return this.dispatch(() => this.binding.logout());
  }

  /**
   * Completion handler registered with the binding at login.
   */
  readonly handleEvent = (event: RawGraphEvent): void => {
    const normalized = normalizeGraphEvent(event);

    if (!normalized.isError && normalized.type === "session") {
      if (normalized.phase === "login") {
        this.loggedIn = true;
      } else if (normalized.phase === "logout") {
        this.loggedIn = false;
      }
    }

    const request = this.pendingRequest;
    this.logResponse(request, normalized);

    if (!request) {
      throw this.usageError(
        "NO_PENDING_REQUEST",
        "Facebook request completed, but no pending request state was available",
      );
    }

    this.pendingRequest = null;
    request.listener({ ...normalized, request });
  };

  private dispatch(call: () => void | Promise<void>): Promise<void> {
    const pending = this.pendingRequest;

    const release = (error: unknown) => {
      if (pending !== null && this.pendingRequest === pending) {
        this.pendingRequest = null;
      }
      this.logger.error(
        "Facebook binding call failed",
        error instanceof Error ? error : null,
        { path: pending?.path },
      );
    };

    let result: void | Promise<void>;
    try {
      result = call();
    } catch (error) {
      release(error);
      throw error;
    }

    return Promise.resolve(result).catch((error: unknown) => {
      release(error);
      throw error;
    });
  }

  private assertNoPendingRequest(context: string): void {
    if (this.pendingRequest !== null) {
      throw this.usageError(
        "REQUEST_PENDING",
        `${context}, a previous request is still being processed`,
      );
    }
  }

  private assertLoggedIn(context: string): void {
    if (!this.loggedIn) {
      throw this.usageError(
        "NOT_LOGGED_IN",
        `${context}, not currently logged in`,
      );
    }
  }

  private usageError(
    code: GraphSessionErrorCode,
    message: string,
  ): GraphSessionError {
    const error = new GraphSessionError(code, message);
    this.logger.error(message, error, { code });
    return error;
  }

  private logResponse(
    request: PendingRequest | null,
    event: NormalizedGraphEvent,
  ): void {
    this.logger.debug("Facebook response", {
      request: request ? describePendingRequest(request) : null,
      event: {
        name: event.name,
        type: event.type,
        phase: event.phase,
        token: redactToken(event.token),
        didComplete: event.didComplete,
        isError: event.isError,
      },
      response: event.response,
    });
  }
}

/**
 * Build a session for the configured environment. In the simulator the
 * HTTP-backed binding is used unless one is supplied.
 */
export function createGraphSession(options: GraphSessionOptions): GraphSession {
  const { settings } = options;
  const logger = resolveServiceLogger(
    options.logger,
    createStructuredLogger({ shouldLogDebug: () => settings.isDebug }),
  );

  let binding = options.binding;
  if (!binding) {
    if (settings.environment !== "simulator") {
      const error = new GraphSessionError(
        "BINDING_MISSING",
        `A native Graph binding is required in the "${settings.environment}" environment`,
      );
      logger.error(error.message, error, { code: error.code });
      throw error;
    }

    binding = new SimulatorGraphBinding({
      accessToken: settings.accessToken,
      apiVersion: settings.apiVersion,
      timeoutMs: settings.timeoutMs,
      logger,
      http: options.http,
    });
  }

  return new GraphSession({ settings, binding, logger });
}
