/**
 * JSON Schema for configuration files
 */

import { INPUT_FORMATS, OUTPUT_FORMATS } from "../../types/config.js";
import { MEMBER_KINDS } from "../../types/data-model.js";

const stringList = {
  type: "array",
  items: { type: "string", minLength: 1 },
};

export const CONFIG_SCHEMA = {
  type: "object",
  additionalProperties: false,
  properties: {
    scan: {
      type: "object",
      additionalProperties: false,
      properties: {
        property: stringList,
        exclude: stringList,
        memberKinds: {
          type: "array",
          items: { type: "string", enum: [...MEMBER_KINDS] },
          uniqueItems: true,
        },
        inputFormat: { type: "string", enum: [...INPUT_FORMATS] },
        output: { type: "string", enum: [...OUTPUT_FORMATS] },
        skipInvalid: { type: "boolean" },
        logLevel: { type: "string", enum: ["error", "warn", "info", "debug"] },
      },
    },
  },
};
