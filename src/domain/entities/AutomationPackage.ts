/**
 * Home Assistant package document model.
 * Field names follow the YAML keys Home Assistant expects.
 */

export interface StateTrigger {
  platform: 'state';
  entity_id: string;
  from?: string;
  /** null restricts the trigger to state changes (attribute changes ignored) */
  to?: string | null;
}

export interface EventTrigger {
  platform: 'event';
  event_type: string;
  event_data?: Record<string, string>;
}

export interface TimeTrigger {
  platform: 'time';
  at: string;
}

export type Trigger = StateTrigger | EventTrigger | TimeTrigger;

export interface StateCondition {
  condition: 'state';
  entity_id: string;
  state: string;
}

export interface TemplateCondition {
  condition: 'template';
  value_template: string;
}

export type Condition = StateCondition | TemplateCondition;

export type ServiceData = Record<string, string | number | number[]>;

export interface ServiceAction {
  service: string;
  target?: { entity_id: string };
  data?: ServiceData;
}

export interface DelayAction {
  delay: string;
}

export interface ChooseOption {
  conditions: Condition[];
  sequence: Action[];
}

export interface ChooseAction {
  choose: ChooseOption[];
  default?: Action[];
}

export interface IfAction {
  if: Condition[];
  then: Action[];
}

export type Action = ServiceAction | DelayAction | ChooseAction | IfAction | Condition;

export type AutomationRunMode = 'single' | 'restart' | 'queued' | 'parallel';

export interface Automation {
  id: string;
  alias: string;
  description?: string;
  trigger: Trigger[];
  condition: Condition[];
  action: Action[];
  mode: AutomationRunMode;
}

export interface InputSelectHelper {
  name: string;
  options: string[];
  initial?: string;
  icon?: string;
}

export interface InputBooleanHelper {
  name: string;
  icon?: string;
}

export interface TimerHelper {
  name: string;
  /** HH:MM:SS */
  duration: string;
  restore?: boolean;
}

export interface TemplateSensor {
  name: string;
  unique_id: string;
  state: string;
  icon?: string;
  /** Attribute name → template */
  attributes?: Record<string, string>;
}

/**
 * Entities declared by the package, keyed by object id within each domain
 */
export interface HelperDeclarations {
  input_select: Record<string, InputSelectHelper>;
  input_boolean: Record<string, InputBooleanHelper>;
  timer: Record<string, TimerHelper>;
  template: Array<{ sensor: TemplateSensor[] }>;
}

/**
 * Complete package document, in the key order it is written
 */
export interface AutomationPackage extends HelperDeclarations {
  automation: Automation[];
}
