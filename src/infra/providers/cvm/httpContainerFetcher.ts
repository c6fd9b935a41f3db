import { err, ok, type Result } from "neverthrow";
import type { Logger } from "pino";
import type { PipelineStageError } from "../../../core/entities/appError";
import type {
  ContainerFetcherPort,
  ContainerFetchRequest,
} from "../../../core/ports/inboundPorts";
import type { IssuerWorkspacePort } from "../../../core/ports/outboundPorts";
import type { HttpClient } from "../../http/httpClient";
import { toFetchError, type HttpSettings } from "./httpSettings";

/**
 * Downloads a filing container into the issuer workspace as `{recordId}.zip`.
 */
export class HttpContainerFetcher implements ContainerFetcherPort {
  constructor(
    private readonly http: HttpClient,
    private readonly workspace: IssuerWorkspacePort,
    private readonly settings: HttpSettings,
    private readonly logger: Logger,
  ) {}

  async fetchContainer(
    request: ContainerFetchRequest,
  ): Promise<Result<string, PipelineStageError>> {
    this.logger.debug(
      { recordId: request.recordId, url: request.url },
      "Downloading filing container",
    );

    const download = await this.http.requestBytes({
      url: request.url,
      signal: request.signal,
      ...this.settings,
    });
    if (download.isErr()) {
      return err(toFetchError(download.error, request.url));
    }

    const saved = await this.workspace.writeFile(
      request.issuerCode,
      `${request.recordId}.zip`,
      download.value,
    );
    if (saved.isErr()) {
      return err(saved.error);
    }

    return ok(saved.value);
  }
}
