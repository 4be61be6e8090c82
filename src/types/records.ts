export type RawRecord = Record<string, unknown>;

export type UserRecord = {
  user_id: number;
  name: string | null;
  username: string | null;
  email: string;
};

export type PostRecord = {
  post_id: number;
  user_id: number;
  title: string;
  body: string | null;
  title_len: number;
};

export type CollectionSource = 'api' | 'fallback';
