/**
 * Dataset Config Code Generator
 *
 * Renders the `elif dataset == "...":` branch that registers a dataset in
 * AnomalyDINO's get_dataset_info(). The output is text meant to be pasted
 * by hand, so it is returned as a string, not a structure.
 */

export interface PreprocessDefaults {
  masking: boolean;
  /** Undefined: the mode leaves rotation to the downstream default */
  rotation?: boolean;
}

/**
 * Masking/rotation defaults per preprocess mode, in the order they are emitted
 */
export const PREPROCESS_DEFAULTS: ReadonlyMap<string, PreprocessDefaults> = new Map([
  ['informed_no_mask', { masking: false, rotation: false }],
  ['agnostic_no_mask', { masking: false, rotation: true }],
  ['agnostic', { masking: true, rotation: true }],
  ['informed', { masking: true, rotation: false }],
  ['masking_only', { masking: true, rotation: false }],
]);

const UNKNOWN_PREPROCESS_DEFAULTS: PreprocessDefaults = { masking: true };

export function resolvePreprocessDefaults(preprocess: string): PreprocessDefaults {
  return PREPROCESS_DEFAULTS.get(preprocess) ?? UNKNOWN_PREPROCESS_DEFAULTS;
}

export interface RenderDatasetConfigInput {
  datasetName: string;
  objects: readonly string[];
  objectAnomalies: ReadonlyMap<string, readonly string[]>;
  /**
   * Resolve the defaults now. Without it the branch keeps the conditional
   * on the downstream `preprocess` variable.
   */
  preprocess?: string;
}

export const CONFIG_FILE_HEADER = [
  '# Add this code to src/utils.py in the get_dataset_info() function',
  "# Insert it before the final 'else' clause that raises ValueError",
];

const BRANCH_INDENT = ' '.repeat(4);
const BODY_INDENT = ' '.repeat(8);
const ENTRY_INDENT = ' '.repeat(12);

function quote(value: string): string {
  return JSON.stringify(value);
}

function pyBool(value: boolean): string {
  return value ? 'True' : 'False';
}

function pyList(values: readonly string[]): string {
  return `[${values.map(quote).join(', ')}]`;
}

function perObjectMapping(objects: readonly string[], value: boolean): string {
  return `{${objects.map((o) => `${quote(o)}: ${pyBool(value)}`).join(', ')}}`;
}

function modesWhere(predicate: (defaults: PreprocessDefaults) => boolean): string[] {
  return [...PREPROCESS_DEFAULTS].filter(([, d]) => predicate(d)).map(([mode]) => mode);
}

function resolvedDefaultLines(objects: readonly string[], preprocess: string): string[] {
  const defaults = resolvePreprocessDefaults(preprocess);
  const lines = [
    `${BODY_INDENT}# Masking and rotation defaults for preprocess=${quote(preprocess)}`,
    `${BODY_INDENT}masking_default = ${perObjectMapping(objects, defaults.masking)}`,
  ];
  if (defaults.rotation !== undefined) {
    lines.push(`${BODY_INDENT}rotation_default = ${perObjectMapping(objects, defaults.rotation)}`);
  }
  return lines;
}

function conditionalDefaultLines(): string[] {
  const noMasking = modesWhere((d) => !d.masking);
  const rotationOn = modesWhere((d) => d.rotation === true);
  const rotationOff = modesWhere((d) => d.rotation === false);
  const inner = `${BODY_INDENT}${' '.repeat(4)}`;

  return [
    `${BODY_INDENT}# Masking and rotation follow the preprocessing strategy`,
    `${BODY_INDENT}if preprocess in ${pyList(noMasking)}:`,
    `${inner}masking_default = {o: False for o in objects}`,
    `${BODY_INDENT}else:`,
    `${inner}# Masking on by default; adjust per object if needed`,
    `${inner}masking_default = {o: True for o in objects}`,
    '',
    `${BODY_INDENT}if preprocess in ${pyList(rotationOn)}:`,
    `${inner}rotation_default = {o: True for o in objects}`,
    `${BODY_INDENT}elif preprocess in ${pyList(rotationOff)}:`,
    `${inner}rotation_default = {o: False for o in objects}`,
  ];
}

/**
 * Render the dataset branch. Starts and ends with a newline.
 */
export function renderDatasetConfig(input: RenderDatasetConfigInput): string {
  const anomalyEntries = [...input.objectAnomalies].map(
    ([object, anomalies]) => `${ENTRY_INDENT}${quote(object)}: ${pyList(anomalies)}`
  );

  const lines = [
    '',
    `${BRANCH_INDENT}elif dataset == "${input.datasetName}":`,
    `${BODY_INDENT}objects = ${pyList(input.objects)}`,
    '',
    `${BODY_INDENT}object_anomalies = {`,
    ...(anomalyEntries.length > 0 ? [anomalyEntries.join(',\n')] : []),
    `${BODY_INDENT}}`,
    '',
    ...(input.preprocess !== undefined
      ? resolvedDefaultLines(input.objects, input.preprocess)
      : conditionalDefaultLines()),
    '',
  ];

  return lines.join('\n');
}

/**
 * File content for `dataset_config_<name>.txt`: instructions, blank line, branch
 */
export function renderDatasetConfigFile(configText: string): string {
  return `${CONFIG_FILE_HEADER.join('\n')}\n\n${configText}`;
}

export function datasetConfigFileName(datasetName: string): string {
  return `dataset_config_${datasetName}.txt`;
}
