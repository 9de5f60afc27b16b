/**
 * Stack Template Type System
 *
 * Defines how an application shape maps onto a CloudFormation stack.
 * Each manifest type has one static definition (no I/O): where its template
 * and parameter document live in the template store, how its template
 * parameters are derived, and which stack parameters it exports.
 */

import type { AppManifest } from '../manifest/index.js'
import type { StackInput, StackParameter } from '../stack/types.js'

export interface AppTemplate<M extends AppManifest, P extends object> {
  /** Manifest type this definition applies to */
  type: M['type']
  /** Human-readable description of what gets provisioned */
  description: string
  /** Template store name of the CloudFormation template */
  templatePath: string
  /** Template store name of the annotated parameter document */
  paramsPath: string
  /** Data both documents are rendered with */
  toTemplateParameters(input: StackInput<M>): P
  /** Ordered CloudFormation parameters, for submitting the stack directly */
  parameters(params: P): StackParameter[]
}
