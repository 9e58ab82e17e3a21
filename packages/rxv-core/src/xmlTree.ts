import * as xml2js from 'xml2js';

/**
 * # XML Tree
 * עטיפה מטופסת מעל הפלט של xml2js, עם שאילתות בסגנון XPath פשוט
 * (צאצא ראשון לפי שם, כל הצאצאים לפי תנאי, נתיב ילדים).
 */

export interface XmlElement {
  name: string;
  attrs: Record<string, string>;
  text: string;
  children: XmlElement[];
}

export type ElementPredicate = (element: XmlElement) => boolean;

const parser = new xml2js.Parser({
  explicitRoot: true,
  explicitChildren: true,
  preserveChildrenOrder: true,
  trim: true,
  tagNameProcessors: [xml2js.processors.stripPrefix],
});

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

function toAttributes(value: unknown): Record<string, string> {
  const attrs: Record<string, string> = {};
  if (isRecord(value)) {
    for (const [key, attrValue] of Object.entries(value)) {
      if (typeof attrValue === 'string') {
        attrs[key] = attrValue;
      }
    }
  }
  return attrs;
}

function toElement(node: unknown, fallbackName: string): XmlElement {
  // אלמנט טקסט בלבד ללא מאפיינים עשוי להגיע כמחרוזת
  if (typeof node === 'string') {
    return { name: fallbackName, attrs: {}, text: node, children: [] };
  }
  if (!isRecord(node)) {
    return { name: fallbackName, attrs: {}, text: '', children: [] };
  }
  const name = typeof node['#name'] === 'string' ? node['#name'] : fallbackName;
  const rawChildren = node['$$'];
  const children = Array.isArray(rawChildren)
    ? rawChildren.map(child => toElement(child, ''))
    : [];
  return {
    name,
    attrs: toAttributes(node['$']),
    text: typeof node['_'] === 'string' ? node['_'] : '',
    children,
  };
}

/**
 * @hebrew מפענח מסמך XML לעץ אלמנטים. קידומות namespace מוסרות משמות התגיות.
 * @throws שגיאת xml2js אם המסמך אינו XML תקין.
 */
export async function parseXmlDocument(xml: string): Promise<XmlElement> {
  const result: unknown = await parser.parseStringPromise(xml);
  if (!isRecord(result)) {
    throw new Error('XML document has no root element');
  }
  const [rootName] = Object.keys(result);
  if (rootName === undefined) {
    throw new Error('XML document has no root element');
  }
  return toElement(result[rootName], rootName);
}

/**
 * @hebrew כל הצאצאים (לא כולל האלמנט עצמו) בסדר מסמך, שעונים על התנאי.
 */
export function findAll(element: XmlElement, predicate: ElementPredicate): XmlElement[] {
  const found: XmlElement[] = [];
  const walk = (current: XmlElement) => {
    for (const child of current.children) {
      if (predicate(child)) {
        found.push(child);
      }
      walk(child);
    }
  };
  walk(element);
  return found;
}

/**
 * @hebrew הצאצא הראשון בסדר מסמך שעונה על התנאי.
 */
export function findFirst(element: XmlElement, predicate: ElementPredicate): XmlElement | undefined {
  for (const child of element.children) {
    if (predicate(child)) {
      return child;
    }
    const nested = findFirst(child, predicate);
    if (nested) {
      return nested;
    }
  }
  return undefined;
}

export const byName = (name: string): ElementPredicate => (element) => element.name === name;

export const byAttr = (attr: string, value: string, name?: string): ElementPredicate =>
  (element) => element.attrs[attr] === value && (name === undefined || element.name === name);

export function childNamed(element: XmlElement, name: string): XmlElement | undefined {
  return element.children.find(child => child.name === name);
}

/**
 * @hebrew הולך לאורך נתיב של ילדים ישירים (למשל ['Main_Zone', 'Volume', 'Mute']).
 */
export function childAt(element: XmlElement, path: readonly string[]): XmlElement | undefined {
  let current: XmlElement | undefined = element;
  for (const segment of path) {
    if (!current) {
      return undefined;
    }
    current = childNamed(current, segment);
  }
  return current;
}

export function textAt(element: XmlElement, path: readonly string[]): string | undefined {
  return childAt(element, path)?.text;
}

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

/**
 * @hebrew פענוח ישויות HTML שנשארו בטקסט אחרי פענוח ה-XML
 * (חלק מהמקורות שולחים טקסט מקודד פעמיים, למשל `&amp;amp;`).
 */
export function unescapeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, entity: string) => {
    if (entity[0] === '#') {
      const codePoint = entity[1] === 'x' || entity[1] === 'X'
        ? parseInt(entity.slice(2), 16)
        : parseInt(entity.slice(1), 10);
      return Number.isFinite(codePoint) && codePoint <= 0x10ffff ? String.fromCodePoint(codePoint) : match;
    }
    return NAMED_ENTITIES[entity.toLowerCase()] ?? match;
  });
}
