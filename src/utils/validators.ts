import { NextFunction, Request, Response } from "express";
import { body, param, ValidationChain, validationResult } from "express-validator";

export const validate = (validations: ValidationChain[]) => {
  return async (req: Request, res: Response, next: NextFunction) => {
    for (const validation of validations) {
      const result = await validation.run(req);
      if (!result.isEmpty()) {
        break;
      }
    }
    const errors = validationResult(req);
    if (errors.isEmpty()) {
      return next();
    }
    return res.status(422).json({ errors: errors.array() });
  };
};

export const queryRunValidator = [
  body("documents")
    .isString()
    .withMessage("documents must be a string")
    .bail()
    .trim()
    .notEmpty()
    .withMessage("documents is required"),
  body("questions")
    .isArray({ min: 1 })
    .withMessage("questions must be a non-empty array"),
  body("questions.*")
    .isString()
    .withMessage("Each question must be a string")
    .bail()
    .custom((value: string) => value.trim().length > 0)
    .withMessage("Questions must not be blank"),
];

export const documentIdValidator = [
  param("documentId")
    .isHexadecimal()
    .withMessage("Invalid document ID")
    .isLength({ min: 64, max: 64 })
    .withMessage("Invalid document ID"),
];
