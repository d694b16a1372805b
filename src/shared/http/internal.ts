// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/http/internal`
 * Purpose: Sealed wiring contract between Filter.with() and the decorators allowed to wrap filters.
 * Scope: The WRAP symbol and WrapSealed interface. Not re-exported from `@shared/http`.
 * Invariants: Trace is the only implementer; code outside shared/http cannot name WRAP through the public surface.
 * Side-effects: none
 * @internal
 */

import type { Filter } from "./filter";
import type { Rejectable } from "./reject";
import type { Reply } from "./reply";
import type { Traced } from "./trace/traced";

export const WRAP: unique symbol = Symbol("routetrace.wrap");

export interface WrapSealed {
  [WRAP]<R extends Reply, E extends Rejectable>(
    filter: Filter<R, E>
  ): Filter<Traced, E>;
}
