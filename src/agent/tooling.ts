/**
 * Tool metadata advertised to the routing model. Argument schemas are the
 * same zod objects the worker validates against.
 */
import {
  compareArgumentsSchema,
  getPriceArgumentsSchema,
} from "../protocol/messages.js";
import { zodToJson } from "./schemaUtils.js";

export const toolDefinitions = [
  {
    type: "function" as const,
    function: {
      name: "get_price",
      description:
        "Return the current price of one stock ticker, from a live quote or local reference data.",
      parameters: zodToJson(getPriceArgumentsSchema),
    },
  },
  {
    type: "function" as const,
    function: {
      name: "compare",
      description:
        "Compare the current prices of two stock tickers and summarise which trades higher.",
      parameters: zodToJson(compareArgumentsSchema),
    },
  },
] as const;
