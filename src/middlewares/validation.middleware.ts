import { ClassConstructor, plainToInstance } from "class-transformer";
import { validate, ValidationError } from "class-validator";
import { RequestHandler } from "express";
import { HttpException } from "@exceptions/HttpException";

// first constraint message, looking into nested objects
const firstMessage = (errors: ValidationError[]): string | undefined => {
  for (const error of errors) {
    const constraints = error.constraints ?? {};
    const keys = Object.keys(constraints);
    if (keys.length > 0) {
      return constraints[keys[0]];
    }
    const nested = firstMessage(error.children ?? []);
    if (nested !== undefined) {
      return nested;
    }
  }
  return undefined;
};

const validationMiddleware = (
  type: ClassConstructor<object>,
  value: "body" | "query" | "params" = "body",
  skipMissingProperties = false,
  whitelist = true,
  forbidNonWhitelisted = false,
): RequestHandler => {
  return (req, res, next) => {
    validate(plainToInstance(type, req[value]), { skipMissingProperties, whitelist, forbidNonWhitelisted })
      .then((errors: ValidationError[]) => {
        if (errors.length > 0) {
          next(new HttpException(400, firstMessage(errors) ?? "bad request"));
        } else {
          next();
        }
      })
      .catch(next);
  };
};

export default validationMiddleware;
