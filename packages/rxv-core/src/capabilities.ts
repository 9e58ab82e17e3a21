import { ValidationError } from './errors';
import type { CapabilitySet, CursorAction, PlaybackAction } from './types';

/**
 * # Capability Model
 * תצוגה בלתי ניתנת לשינוי של סט היכולות. נבנית פעם אחת בגילוי ומשותפת
 * לכל בקרי האזורים של אותו התקן.
 */

const freezeList = (values: readonly string[]): readonly string[] => Object.freeze([...values]);

function freezeRecordOfLists(record: Record<string, readonly string[]>): Readonly<Record<string, readonly string[]>> {
  const copy: Record<string, readonly string[]> = {};
  for (const [key, values] of Object.entries(record)) {
    copy[key] = freezeList(values);
  }
  return Object.freeze(copy);
}

const hasOwn = (record: object, key: string): boolean => Object.prototype.hasOwnProperty.call(record, key);

export class Capabilities {
  readonly zones: readonly string[];
  readonly commands: readonly string[];
  private readonly zoneSurroundPrograms: Readonly<Record<string, readonly string[]>>;
  private readonly sourcePlayMethods: Readonly<Record<string, readonly string[]>>;
  private readonly sourceCursorActions: Readonly<Record<string, readonly string[]>>;
  private readonly inputsSource: Readonly<Record<string, string>>;
  private readonly scenesNumber: Readonly<Record<string, string>>;
  private readonly commandPaths: ReadonlySet<string>;

  private constructor(set: CapabilitySet) {
    this.zones = freezeList(set.zones);
    this.commands = freezeList(set.commands);
    this.zoneSurroundPrograms = freezeRecordOfLists(set.zoneSurroundPrograms);
    this.sourcePlayMethods = freezeRecordOfLists(set.sourcePlayMethods);
    this.sourceCursorActions = freezeRecordOfLists(set.sourceCursorActions);
    this.inputsSource = Object.freeze({ ...set.inputsSource });
    this.scenesNumber = Object.freeze({ ...set.scenesNumber });
    this.commandPaths = new Set(set.commands);
    Object.freeze(this);
  }

  /**
   * @hebrew בונה תצוגה מוקפאת מעותק של הרשומה; שינויים ברשומה המקורית לא משפיעים עליה.
   */
  static from(set: CapabilitySet): Capabilities {
    return new Capabilities(set);
  }

  // --- אזורים ---

  hasZone(zone: string): boolean {
    return this.zones.includes(zone);
  }

  assertZone(zone: string): void {
    if (!this.hasZone(zone)) {
      throw new ValidationError(`Unknown zone "${zone}". Known zones: ${this.zones.join(', ')}`);
    }
  }

  /**
   * @hebrew תוכניות הסראונד של אזור. אזור ללא תפריט Setup מחזיר רשימה ריקה.
   * @throws ValidationError עבור אזור שאינו קיים.
   */
  surroundPrograms(zone: string): readonly string[] {
    this.assertZone(zone);
    return hasOwn(this.zoneSurroundPrograms, zone) ? this.zoneSurroundPrograms[zone] ?? [] : [];
  }

  // --- פקודות ---

  /**
   * @hebrew האם נתיב הפקודה (למשל `NET_RADIO`, `List_Control`, `Cursor`) מופיע ברשימת הפקודות.
   */
  supportsCommand(...path: string[]): boolean {
    return this.commandPaths.has(path.join(','));
  }

  findCommands(prefix: string): string[] {
    return this.commands.filter(command => command.startsWith(prefix));
  }

  // --- קלטים ---

  get inputs(): readonly string[] {
    return Object.keys(this.inputsSource);
  }

  hasInput(input: string): boolean {
    return hasOwn(this.inputsSource, input);
  }

  assertInput(input: string): void {
    if (!this.hasInput(input)) {
      throw new ValidationError(`Unknown input "${input}". Known inputs: ${this.inputs.join(', ')}`);
    }
  }

  /**
   * @hebrew שם המקור הפנימי של קלט, או undefined כשלקלט אין צומת מקור משלו.
   * @throws ValidationError עבור קלט שאינו קיים.
   */
  sourceOfInput(input: string): string | undefined {
    this.assertInput(input);
    return this.inputsSource[input] || undefined;
  }

  // --- מקורות ---

  hasPlaySource(source: string): boolean {
    return hasOwn(this.sourcePlayMethods, source);
  }

  /**
   * @throws ValidationError עבור מקור שאינו מצהיר על Play_Control.
   */
  playMethods(source: string): readonly string[] {
    const methods = hasOwn(this.sourcePlayMethods, source) ? this.sourcePlayMethods[source] : undefined;
    if (!methods) {
      throw new ValidationError(`Source "${source}" advertises no playback methods`);
    }
    return methods;
  }

  supportsPlayMethod(source: string, action: PlaybackAction): boolean {
    return this.hasPlaySource(source) && this.playMethods(source).includes(action);
  }

  hasCursorSource(source: string): boolean {
    return hasOwn(this.sourceCursorActions, source);
  }

  /**
   * @throws ValidationError עבור מקור שאינו מצהיר על פעולות סמן.
   */
  cursorActions(source: string): readonly string[] {
    const actions = hasOwn(this.sourceCursorActions, source) ? this.sourceCursorActions[source] : undefined;
    if (!actions) {
      throw new ValidationError(`Source "${source}" advertises no cursor actions`);
    }
    return actions;
  }

  supportsCursorAction(source: string, action: CursorAction): boolean {
    return this.hasCursorSource(source) && this.cursorActions(source).includes(action);
  }

  // --- סצנות ---

  get scenes(): readonly string[] {
    return Object.keys(this.scenesNumber);
  }

  hasScene(scene: string): boolean {
    return hasOwn(this.scenesNumber, scene);
  }

  /**
   * @throws ValidationError עבור סצנה שאינה קיימת.
   */
  sceneCode(scene: string): string {
    const code = this.hasScene(scene) ? this.scenesNumber[scene] : undefined;
    if (code === undefined) {
      throw new ValidationError(`Unknown scene "${scene}". Known scenes: ${this.scenes.join(', ')}`);
    }
    return code;
  }

  /**
   * @hebrew שם הסצנה לפי הקוד שלה (למשל `Scene 2`), אם קיים.
   */
  sceneName(code: string): string | undefined {
    return Object.keys(this.scenesNumber).find(name => this.scenesNumber[name] === code);
  }

  toJSON(): CapabilitySet {
    const lists = (record: Readonly<Record<string, readonly string[]>>) =>
      Object.fromEntries(Object.entries(record).map(([key, values]) => [key, [...values]]));
    return {
      zones: [...this.zones],
      commands: [...this.commands],
      zoneSurroundPrograms: lists(this.zoneSurroundPrograms),
      sourcePlayMethods: lists(this.sourcePlayMethods),
      sourceCursorActions: lists(this.sourceCursorActions),
      inputsSource: { ...this.inputsSource },
      scenesNumber: { ...this.scenesNumber },
    };
  }
}
