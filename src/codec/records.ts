/**
 * Domain payload records carried inside a BurnMemo
 * @module codec/records
 */

import { InvalidParameterError, OtherError } from '../errors.js';
import { BorshReader, BorshWriter, utf8Length } from './borsh.js';

export const RECORD_VERSION = 1;

export interface ProfileCreateRecord {
  category: 'profile';
  operation: 'create_profile';
  userPubkey: string;
  username: string;
  image: string;
  aboutMe?: string;
}

/**
 * Omitted fields stay unchanged. `aboutMe: null` clears the field.
 */
export interface ProfileUpdateRecord {
  category: 'profile';
  operation: 'update_profile';
  userPubkey: string;
  username?: string;
  image?: string;
  aboutMe?: string | null;
}

export interface BlogCreateRecord {
  category: 'blog';
  operation: 'create_blog';
  blogId: bigint;
  name: string;
  description: string;
  image: string;
}

export interface BlogUpdateRecord {
  category: 'blog';
  operation: 'update_blog';
  blogId: bigint;
  name?: string;
  description?: string;
  image?: string;
}

export interface BlogBurnRecord {
  category: 'blog';
  operation: 'burn_for_blog';
  blogId: bigint;
  burner: string;
  message: string;
}

export interface BlogMintRecord {
  category: 'blog';
  operation: 'mint_for_blog';
  blogId: bigint;
  minter: string;
  message: string;
}

export interface PostCreateRecord {
  category: 'forum';
  operation: 'create_post';
  creator: string;
  postId: bigint;
  title: string;
  content: string;
  image: string;
}

export interface PostBurnRecord {
  category: 'forum';
  operation: 'burn_for_post';
  user: string;
  postId: bigint;
  message: string;
}

export interface PostMintRecord {
  category: 'forum';
  operation: 'mint_for_post';
  user: string;
  postId: bigint;
  message: string;
}

export interface ProjectCreateRecord {
  category: 'project';
  operation: 'create_project';
  projectId: bigint;
  name: string;
  description: string;
  image: string;
  website: string;
  tags: string[];
}

export interface ProjectUpdateRecord {
  category: 'project';
  operation: 'update_project';
  projectId: bigint;
  name?: string;
  description?: string;
  image?: string;
  website?: string;
  tags?: string[];
}

export interface ProjectBurnRecord {
  category: 'project';
  operation: 'burn_for_project';
  projectId: bigint;
  burner: string;
  message: string;
}

export type DomainRecord =
  | ProfileCreateRecord
  | ProfileUpdateRecord
  | BlogCreateRecord
  | BlogUpdateRecord
  | BlogBurnRecord
  | BlogMintRecord
  | PostCreateRecord
  | PostBurnRecord
  | PostMintRecord
  | ProjectCreateRecord
  | ProjectUpdateRecord
  | ProjectBurnRecord;

export type RecordOperation = DomainRecord['operation'];
export type RecordCategory = DomainRecord['category'];

const CATEGORY_OF: Record<RecordOperation, RecordCategory> = {
  create_profile: 'profile',
  update_profile: 'profile',
  create_blog: 'blog',
  update_blog: 'blog',
  burn_for_blog: 'blog',
  mint_for_blog: 'blog',
  create_post: 'forum',
  burn_for_post: 'forum',
  mint_for_post: 'forum',
  create_project: 'project',
  update_project: 'project',
  burn_for_project: 'project',
};

function isRecordOperation(value: string): value is RecordOperation {
  return Object.prototype.hasOwnProperty.call(CATEGORY_OF, value);
}

// Field limits, in UTF-8 bytes
export const LIMITS = {
  username: { min: 1, max: 32 },
  profileImage: { min: 0, max: 256 },
  aboutMe: { min: 0, max: 128 },
  name: { min: 1, max: 64 },
  description: { min: 0, max: 256 },
  image: { min: 0, max: 256 },
  contentMessage: { min: 0, max: 696 },
  title: { min: 1, max: 128 },
  postContent: { min: 1, max: 512 },
  postMessage: { min: 0, max: 512 },
  website: { min: 0, max: 128 },
  tag: { min: 1, max: 32 },
  maxTags: 4,
} as const;

function checkText(field: string, value: string, limit: { min: number; max: number }): void {
  const length = utf8Length(value);
  if (length < limit.min || length > limit.max) {
    const range = limit.min > 0 ? `${limit.min}-${limit.max}` : `at most ${limit.max}`;
    throw new InvalidParameterError(field, `${field} must be ${range} bytes, got ${length}`);
  }
}

function checkOptionalText(
  field: string,
  value: string | undefined,
  limit: { min: number; max: number }
): void {
  if (value !== undefined) {
    checkText(field, value, limit);
  }
}

function checkTags(tags: readonly string[]): void {
  if (tags.length > LIMITS.maxTags) {
    throw new InvalidParameterError('tags', `tags must have at most ${LIMITS.maxTags} entries, got ${tags.length}`);
  }
  tags.forEach((tag, index) => checkText(`tags[${index}]`, tag, LIMITS.tag));
}

/**
 * Check a record against the limits the programs enforce on-chain.
 * Throws InvalidParameterError naming the first offending field.
 */
export function validateRecord(record: DomainRecord): void {
  if (CATEGORY_OF[record.operation] !== record.category) {
    throw new InvalidParameterError(
      'category',
      `Operation ${record.operation} does not belong to category ${record.category}`
    );
  }

  switch (record.operation) {
    case 'create_profile':
      checkText('username', record.username, LIMITS.username);
      checkText('image', record.image, LIMITS.profileImage);
      checkOptionalText('aboutMe', record.aboutMe, LIMITS.aboutMe);
      return;
    case 'update_profile':
      checkOptionalText('username', record.username, LIMITS.username);
      checkOptionalText('image', record.image, LIMITS.profileImage);
      checkOptionalText('aboutMe', record.aboutMe ?? undefined, LIMITS.aboutMe);
      return;
    case 'create_blog':
      checkText('name', record.name, LIMITS.name);
      checkText('description', record.description, LIMITS.description);
      checkText('image', record.image, LIMITS.image);
      return;
    case 'update_blog':
      checkOptionalText('name', record.name, LIMITS.name);
      checkOptionalText('description', record.description, LIMITS.description);
      checkOptionalText('image', record.image, LIMITS.image);
      return;
    case 'burn_for_blog':
    case 'mint_for_blog':
    case 'burn_for_project':
      checkText('message', record.message, LIMITS.contentMessage);
      return;
    case 'create_post':
      checkText('title', record.title, LIMITS.title);
      checkText('content', record.content, LIMITS.postContent);
      checkText('image', record.image, LIMITS.image);
      return;
    case 'burn_for_post':
    case 'mint_for_post':
      checkText('message', record.message, LIMITS.postMessage);
      return;
    case 'create_project':
      checkText('name', record.name, LIMITS.name);
      checkText('description', record.description, LIMITS.description);
      checkText('image', record.image, LIMITS.image);
      checkText('website', record.website, LIMITS.website);
      checkTags(record.tags);
      return;
    case 'update_project':
      checkOptionalText('name', record.name, LIMITS.name);
      checkOptionalText('description', record.description, LIMITS.description);
      checkOptionalText('image', record.image, LIMITS.image);
      checkOptionalText('website', record.website, LIMITS.website);
      if (record.tags !== undefined) {
        checkTags(record.tags);
      }
      return;
  }
}

const writeString = (w: BorshWriter, value: string): void => {
  w.string(value);
};

export function encodeRecord(record: DomainRecord): Buffer {
  const w = new BorshWriter().u8(RECORD_VERSION).string(record.category).string(record.operation);

  switch (record.operation) {
    case 'create_profile':
      w.string(record.userPubkey).string(record.username).string(record.image);
      w.option(record.aboutMe, writeString);
      break;
    case 'update_profile':
      w.string(record.userPubkey);
      w.option(record.username, writeString);
      w.option(record.image, writeString);
      // outer None: unchanged, Some(None): clear
      w.option(record.aboutMe, (inner, value) => {
        inner.option(value ?? undefined, writeString);
      });
      break;
    case 'create_blog':
      w.u64(record.blogId, 'blogId').string(record.name).string(record.description).string(record.image);
      break;
    case 'update_blog':
      w.u64(record.blogId, 'blogId');
      w.option(record.name, writeString);
      w.option(record.description, writeString);
      w.option(record.image, writeString);
      break;
    case 'burn_for_blog':
      w.u64(record.blogId, 'blogId').string(record.burner).string(record.message);
      break;
    case 'mint_for_blog':
      w.u64(record.blogId, 'blogId').string(record.minter).string(record.message);
      break;
    case 'create_post':
      w.string(record.creator).u64(record.postId, 'postId');
      w.string(record.title).string(record.content).string(record.image);
      break;
    case 'burn_for_post':
    case 'mint_for_post':
      w.string(record.user).u64(record.postId, 'postId').string(record.message);
      break;
    case 'create_project':
      w.u64(record.projectId, 'projectId');
      w.string(record.name).string(record.description).string(record.image).string(record.website);
      w.stringVec(record.tags);
      break;
    case 'update_project':
      w.u64(record.projectId, 'projectId');
      w.option(record.name, writeString);
      w.option(record.description, writeString);
      w.option(record.image, writeString);
      w.option(record.website, writeString);
      w.option(record.tags, (inner, tags) => {
        inner.stringVec(tags);
      });
      break;
    case 'burn_for_project':
      w.u64(record.projectId, 'projectId').string(record.burner).string(record.message);
      break;
  }

  return w.toBuffer();
}

const readString = (r: BorshReader): string => r.string('value');

function readBody(r: BorshReader, operation: RecordOperation): DomainRecord {
  switch (operation) {
    case 'create_profile':
      return {
        category: 'profile',
        operation,
        userPubkey: r.string('userPubkey'),
        username: r.string('username'),
        image: r.string('image'),
        aboutMe: r.option('aboutMe', readString),
      };
    case 'update_profile': {
      const userPubkey = r.string('userPubkey');
      const username = r.option('username', readString);
      const image = r.option('image', readString);
      const aboutMe = r.option('aboutMe', (inner) => inner.option('aboutMe.inner', readString) ?? null);
      return { category: 'profile', operation, userPubkey, username, image, aboutMe };
    }
    case 'create_blog':
      return {
        category: 'blog',
        operation,
        blogId: r.u64('blogId'),
        name: r.string('name'),
        description: r.string('description'),
        image: r.string('image'),
      };
    case 'update_blog':
      return {
        category: 'blog',
        operation,
        blogId: r.u64('blogId'),
        name: r.option('name', readString),
        description: r.option('description', readString),
        image: r.option('image', readString),
      };
    case 'burn_for_blog':
      return {
        category: 'blog',
        operation,
        blogId: r.u64('blogId'),
        burner: r.string('burner'),
        message: r.string('message'),
      };
    case 'mint_for_blog':
      return {
        category: 'blog',
        operation,
        blogId: r.u64('blogId'),
        minter: r.string('minter'),
        message: r.string('message'),
      };
    case 'create_post':
      return {
        category: 'forum',
        operation,
        creator: r.string('creator'),
        postId: r.u64('postId'),
        title: r.string('title'),
        content: r.string('content'),
        image: r.string('image'),
      };
    case 'burn_for_post':
    case 'mint_for_post':
      return {
        category: 'forum',
        operation,
        user: r.string('user'),
        postId: r.u64('postId'),
        message: r.string('message'),
      };
    case 'create_project':
      return {
        category: 'project',
        operation,
        projectId: r.u64('projectId'),
        name: r.string('name'),
        description: r.string('description'),
        image: r.string('image'),
        website: r.string('website'),
        tags: r.stringVec('tags'),
      };
    case 'update_project':
      return {
        category: 'project',
        operation,
        projectId: r.u64('projectId'),
        name: r.option('name', readString),
        description: r.option('description', readString),
        image: r.option('image', readString),
        website: r.option('website', readString),
        tags: r.option('tags', (inner) => inner.stringVec('tags')),
      };
    case 'burn_for_project':
      return {
        category: 'project',
        operation,
        projectId: r.u64('projectId'),
        burner: r.string('burner'),
        message: r.string('message'),
      };
  }
}

/**
 * Strict decode: known version, known category/operation pair, no
 * trailing bytes.
 */
export function decodeRecord(bytes: Uint8Array): DomainRecord {
  const r = new BorshReader(bytes);
  const version = r.u8('version');
  if (version !== RECORD_VERSION) {
    throw new OtherError(`Unsupported record version: ${version}`);
  }
  const category = r.string('category');
  const operation = r.string('operation');
  if (!isRecordOperation(operation) || CATEGORY_OF[operation] !== category) {
    throw new OtherError(`Unknown record type: ${category}/${operation}`);
  }
  const record = readBody(r, operation);
  r.expectEnd(`${category}/${operation}`);
  return record;
}

export function tryDecodeRecord(bytes: Uint8Array): DomainRecord | undefined {
  try {
    return decodeRecord(bytes);
  } catch {
    return undefined;
  }
}
