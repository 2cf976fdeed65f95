import * as Joi from "joi";
import {
  MAX_LISTING_PAGE_SIZE,
  MenuTreeDefinition,
  NODE_TYPES,
  TERMINAL_EFFECTS,
} from "./types/menu.types";

const nodeId = Joi.string().pattern(/^[a-z][a-z0-9_]*$/);
const fieldName = Joi.string().pattern(/^[a-zA-Z][a-zA-Z0-9_]*$/);
const prompt = Joi.string().min(1).required();

const choiceSchema = Joi.object({
  input: Joi.string().min(1).max(3).required(),
  label: Joi.string().min(1).required(),
  next: nodeId.required(),
  value: Joi.string().min(1),
});

const validatorSchema = Joi.alternatives().try(
  Joi.object({
    type: Joi.string().valid("text").required(),
    minLength: Joi.number().integer().min(0),
    maxLength: Joi.number().integer().min(1),
  }),
  Joi.object({ type: Joi.string().valid("phone").required() }),
  Joi.object({
    type: Joi.string().valid("number").required(),
    min: Joi.number().integer(),
    max: Joi.number().integer(),
  }),
  Joi.object({
    type: Joi.string().valid("pattern").required(),
    pattern: Joi.string().required(),
    message: Joi.string(),
  }),
);

const menuNodeSchema = Joi.object({
  id: nodeId.required(),
  type: Joi.string().valid(NODE_TYPES.MENU).required(),
  prompt,
  field: fieldName,
  back: Joi.boolean(),
  choices: Joi.array().items(choiceSchema).min(1),
  options: Joi.string(),
  next: nodeId,
  branches: Joi.object().pattern(Joi.string(), nodeId),
})
  .xor("choices", "options")
  .with("options", "next")
  .with("branches", "options");

const inputNodeSchema = Joi.object({
  id: nodeId.required(),
  type: Joi.string().valid(NODE_TYPES.INPUT).required(),
  prompt,
  field: fieldName.required(),
  validator: validatorSchema.required(),
  next: nodeId.required(),
  back: Joi.boolean(),
});

const listingPageNodeSchema = Joi.object({
  id: nodeId.required(),
  type: Joi.string().valid(NODE_TYPES.LISTING_PAGE).required(),
  prompt,
  field: fieldName.required(),
  next: nodeId.required(),
  pageSize: Joi.number().integer().min(1).max(MAX_LISTING_PAGE_SIZE),
  emptyText: Joi.string().required(),
  back: Joi.boolean(),
});

const terminalNodeSchema = Joi.object({
  id: nodeId.required(),
  type: Joi.string().valid(NODE_TYPES.TERMINAL).required(),
  prompt,
  effect: Joi.string().valid(...Object.values(TERMINAL_EFFECTS)),
  outcome: Joi.string().valid("completed", "abandoned"),
});

const messagesSchema = Joi.object({
  invalidChoice: Joi.string().required(),
  tooManyAttempts: Joi.string().required(),
  goodbye: Joi.string().required(),
  sessionExpired: Joi.string().required(),
  serviceUnavailable: Joi.string().required(),
  unexpectedError: Joi.string().required(),
  backLabel: Joi.string().required(),
  moreLabel: Joi.string().required(),
  listingUnavailable: Joi.string().required(),
  missingDetails: Joi.string().required(),
});

export const menuTreeSchema = Joi.object<MenuTreeDefinition>({
  root: nodeId.required(),
  messages: messagesSchema.required(),
  options: Joi.object().pattern(Joi.string(), Joi.array().items(Joi.string().min(1)).min(1)),
  nodes: Joi.array()
    .items(
      Joi.alternatives().try(
        menuNodeSchema,
        inputNodeSchema,
        listingPageNodeSchema,
        terminalNodeSchema,
      ),
    )
    .min(1)
    .required(),
});
