import { NextFunction, Request, Response } from "express";
import { HttpException } from "@exceptions/HttpException";
import { logger } from "@utils/logger";

const errorMiddleware = (error: Error, req: Request, res: Response, next: NextFunction) => {
  try {
    const status = error instanceof HttpException ? error.status : 500;
    const code = error instanceof HttpException ? error.code : undefined;
    const message = error.message || "Something went wrong";

    logger.error(`[${req.method}] ${req.path} >> StatusCode:: ${status}, Message:: ${message}`);
    res.status(status).json(code === undefined ? { message } : { message, code });
  } catch (error) {
    next(error);
  }
};

export default errorMiddleware;
