export interface Credentials {
  username: string;
  password: string;
}

export interface FetchRequest extends Credentials {
  days: number;
  start?: string;
  end?: string;
}

export type FetchInput = Credentials & Partial<Pick<FetchRequest, "days" | "start" | "end">>;
