/**
 * Pseudo-fields of passive `topvalues()`
 */

import { ipv4Network } from "../codec.js";
import { InvalidPseudoFieldError } from "../errors.js";
import { searchIPv4 } from "../search/common.js";
import { intArgument, PseudoFieldTable, type PseudoField } from "./table.js";

const ENTRIES: readonly PseudoField[] = [
  {
    pattern: /^net(?::(.*))?$/,
    build: (m, ctx) => {
      const bits = m[1] === undefined ? 24 : intArgument(m[0], m[1]);
      if (bits < 0 || bits > 32) {
        throw new InvalidPseudoFieldError(m[0], "prefix length must be between 0 and 32");
      }
      const weighted = ctx.countField !== undefined;
      return {
        filter: searchIPv4(),
        fields: ["addr"],
        extract: function* (rec) {
          const addr = rec["addr"];
          if (typeof addr !== "string") return;
          const count = rec["count"];
          yield [ipv4Network(addr, bits), weighted && typeof count === "number" ? count : 1];
        },
      };
    },
  },
];

export const PASSIVE_TOPVALUES = new PseudoFieldTable(ENTRIES);
