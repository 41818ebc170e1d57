export {
  createReviewServer,
  fallbackPage,
  resolveUiDistPath,
  startWebServer,
  type ReviewServerOptions,
  type StartedWebServer,
  type StartWebServerOptions,
} from "./web.server";
export type {
  CommentDTO,
  DocumentDTO,
  FinishResultDTO,
  IReviewSessionApi,
  StaleNoticeDTO,
  WebErrorDTO,
} from "./web.types";
