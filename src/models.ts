export const RENDER_MODELS = {
  default: "text-davinci-002-render-sha",
  "legacy-paid": "text-davinci-002-render-paid",
  "legacy-free": "text-davinci-002-render",
} as const;

export type ModelName = keyof typeof RENDER_MODELS;

export const MODEL_NAMES = ["default", "legacy-paid", "legacy-free"] as const satisfies readonly ModelName[];

export function isModelName(value: string): value is ModelName {
  return Object.prototype.hasOwnProperty.call(RENDER_MODELS, value);
}

export function renderModelFor(name: ModelName): string {
  return RENDER_MODELS[name];
}
