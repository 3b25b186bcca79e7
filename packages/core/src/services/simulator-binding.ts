import axios, { type AxiosInstance } from "axios";
import { GRAPH } from "../config/graph-config.ts";
import { GraphSessionError, getErrorMessage } from "../utils/error-util.ts";
import { buildGraphUrl } from "../utils/url-builder-util.ts";
import type { ServiceLogger } from "./logger-service.ts";
import type {
  GraphBinding,
  GraphHttpMethod,
  GraphParams,
  RawGraphEvent,
  RawGraphEventListener,
} from "../types.ts";

export interface SimulatorBindingOptions {
  accessToken?: string;
  apiVersion?: string;
  timeoutMs: number;
  logger: Required<ServiceLogger>;
  http?: AxiosInstance;
}

/**
 * Stands in for the native SDK where there is none. Login and logout are
 * synthesized from the configured access token; requests go straight to
 * the Graph API over HTTP. Dialogs are not available.
 */
export class SimulatorGraphBinding implements GraphBinding {
  private listener: RawGraphEventListener | null = null;
  private readonly http: AxiosInstance;

  constructor(private readonly options: SimulatorBindingOptions) {
    this.http = options.http ?? axios;
  }

  login(
    _appId: string,
    listener: RawGraphEventListener,
    _permissions: readonly string[],
  ): void {
    this.listener = listener;

    if (!this.options.accessToken) {
      this.options.logger.warn(
        "Simulator login has no access token; Graph requests will be rejected",
      );
    }

    this.emit({
      name: GRAPH.EVENT_NAME,
      type: "session",
      phase: "login",
      token: this.options.accessToken,
    });
  }

  request(
    path: string,
    method: GraphHttpMethod,
    params: GraphParams,
  ): Promise<void> {
    const listener = this.requireListener();
    const { accessToken, apiVersion, timeoutMs } = this.options;

    if (!accessToken) {
      throw new GraphSessionError(
        "ACCESS_TOKEN_MISSING",
        "Facebook functionality in the simulator requires that FB_ACCESS_TOKEN be set",
      );
    }

    const url = buildGraphUrl(
      path,
      { ...params, [GRAPH.ACCESS_TOKEN_PARAM]: accessToken },
      { apiVersion },
    );

    this.options.logger.debug(`Simulator Facebook request: ${url}`, {
      method,
    });

    return this.http
      .request<string>({
        url,
        method,
        timeout: timeoutMs,
        responseType: "text",
        transformResponse: [(data: unknown) => data],
        validateStatus: () => true,
      })
      .then(
        (response) => {
          listener({
            name: GRAPH.EVENT_NAME,
            type: "request",
            isError: false,
            response: typeof response.data === "string" ? response.data : "",
          });
        },
        (error: unknown) => {
          listener({
            name: GRAPH.EVENT_NAME,
            type: "request",
            isError: true,
            response: getErrorMessage(error),
          });
        },
      );
  }

  showDialog(_params: GraphParams): void {
    throw new GraphSessionError(
      "DIALOG_UNSUPPORTED",
      "Facebook showDialog not supported in simulator",
    );
  }

  logout(): void {
    this.emit({
      name: GRAPH.EVENT_NAME,
      type: "session",
      phase: "logout",
    });
  }

  private emit(event: RawGraphEvent): void {
    this.requireListener()(event);
  }

  private requireListener(): RawGraphEventListener {
    if (!this.listener) {
      throw new GraphSessionError(
        "LISTENER_MISSING",
        "Simulator binding has no event listener; login must be called first",
      );
    }
    return this.listener;
  }
}
