/**
 * Specs, parameter-type and template-field payloads built from CSV exports.
 */

export type SpecTranslations = {
  en: {
    name: string;
    DDF_Defaulttext_OK: string;
    DDF_Defaulttext_NOT_OK: string;
    DDF_Defaulttext_Toleranzbereich_NOT_OK: string;
  };
};

export type Spec = {
  name: string;
  type: number | null;
  status: number | null;
  archiviert: number | null;
  order: string | null;
  /** JSON text of a `SpecTranslations` object, not the object itself. */
  translations: string;
};

export type SpecsPayload = { specs: { action: "create"; data: Spec }[] };

export type ParameterType = {
  name: string;
  group_id: string;
  DDF_days: string;
  DDF_price: string;
  description: string;
  einheit: string;
  DDF_GBAID: string;
  translations: { en: { name: string; einheit: string } };
};

export type ParameterTypesPayload = { parametertypes: { action: "create"; data: ParameterType }[] };

export type TemplateField = { template_id: string; field: string };

export type TemplateFieldsPayload = { templatefields: { action: "create"; data: TemplateField }[] };
