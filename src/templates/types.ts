// Template-specific types
import { StackKind } from '../types';

/** One entry of a CloudFormation parameter file */
export interface ParameterEntry {
  ParameterKey: string;
  ParameterValue: string;
}

export interface TemplateSource {
  kind: StackKind;
  path: string;
  body: string;
}

export interface TemplateInspection {
  valid: boolean;
  errors: string[];
  /** Parameter names the template declares */
  parameters: string[];
}
