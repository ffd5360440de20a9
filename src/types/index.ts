export type { JsonPrimitive, JsonValue, JsonObject } from "./json";
export type {
  DdfType,
  RuleColor,
  RuleOperator,
  RuleLinker,
  RuleValue,
  Rule,
  RuleItem,
  RulesPayload,
  RulesDocument,
  ImportedRule,
  ImportedRulesPayload,
} from "./rules";
export type {
  SpecTranslations,
  Spec,
  SpecsPayload,
  ParameterType,
  ParameterTypesPayload,
  TemplateField,
  TemplateFieldsPayload,
} from "./specs";
