/**
 * Extension points for functions, builtins and endpoint enrichment.
 *
 * @module engine/extension
 */

import type { RuntimeMap } from '../runtime/values.js';
import type { EndpointBuilder, HeaderMap } from '../vm/endpoint.js';
import type { RulesFunction } from '../vm/functions.js';
import type { BuiltinProvider, EvaluationContext } from '../vm/register-filler.js';

export interface RulesExtension {
  readonly name: string;

  /** Functions made callable through the FN opcodes */
  functions?(): readonly RulesFunction[];

  /** Builtin providers keyed by builtin name, e.g. `SDK::Endpoint` */
  builtinProviders?(): Readonly<Record<string, BuiltinProvider>>;

  /**
   * Called for every endpoint a result body returns, after its headers and
   * properties are set.
   */
  extractEndpointProperties?(
    builder: EndpointBuilder,
    context: EvaluationContext,
    properties: RuntimeMap,
    headers: HeaderMap,
  ): void;
}
