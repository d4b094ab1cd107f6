/**
 * Reporter module types
 */

import type { ResultMapping } from "../../types/data-model.js";

export type Renderer = (mapping: ResultMapping) => string;
