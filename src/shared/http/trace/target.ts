// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/http/trace/target`
 * Purpose: Diagnostic target shared by every span and event this decorator emits.
 * Side-effects: none
 * @public
 */

import { createDiag } from "@/shared/observability/tracing";

export const TRACE_TARGET = "routetrace";

export const diag = createDiag(TRACE_TARGET);
