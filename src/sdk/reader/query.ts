import {getAddress, type Address} from "viem";

import {createAnnotation, type Annotations} from "../../contract";
import {ArkivError} from "../../errors";

const KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;

const quote = (value: string) =>
    `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;

/**
 * Equality query in the node query language, e.g.
 * `type = "note" && version = 2 && $owner = 0xAbC...`.
 */
export function buildQuery(filter: {
    annotations?: Annotations;
    owner?: Address;
}): string {
    const conditions: string[] = [];

    for (const [key, value] of Object.entries(filter.annotations ?? {})) {
        if (!KEY_PATTERN.test(key)) {
            throw new ArkivError(`invalid annotation key for query: ${key}`);
        }
        const annotation = createAnnotation(key, value);
        conditions.push(
            typeof annotation.value === "string"
                ? `${key} = ${quote(annotation.value)}`
                : `${key} = ${annotation.value}`,
        );
    }

    if (filter.owner) {
        conditions.push(`$owner = ${getAddress(filter.owner)}`);
    }

    if (conditions.length === 0) {
        throw new ArkivError("query needs at least one condition");
    }
    return conditions.join(" && ");
}
