// index order must match the order the model was trained with
export const CLASSES: readonly string[] = [
  'Speed Limit 50',
  'Speed Limit 100',
  'No Overtaking',
  'Yield',
  'Stop',
  'No Entry',
  'Danger Ahead',
  'Road Work Ahead',
  'Pedestrian Crossing',
  'Children Crossing',
];

export function className(classNames: readonly string[], id: number): string {
  return classNames[id] ?? String(id);
}
