import type { NextFunction } from "./common";
import type { HandlerContext, HttpResponse } from "./http";

export type HandlerResponse = HttpResponse;

export interface PlinthLayer<TContext extends HandlerContext = HandlerContext> {
  handle(context: TContext, next: NextFunction<HandlerResponse>): Promise<HandlerResponse>;
  dispose?(): Promise<void> | void;
}
