import type { IrcPalette } from './services/ircPalette';

export enum IrcStyle {
  Bold = 'bold',
  Italic = 'italic',
  LineThrough = 'line-through',
  Underline = 'underline',
  Inverse = 'inverse',
}

// Standard mIRC color indices.
export enum IrcColor {
  White = 0,
  Black,
  Blue,
  Green,
  Red,
  Brown,
  Purple,
  Orange,
  Yellow,
  LightGreen,
  Cyan,
  LightCyan,
  LightBlue,
  Pink,
  Gray,
  LightGray,
}

export enum SpanFormat {
  Style = 'style', // <span style='...'>
  Class = 'class', // <span class='...'>
}

export type IrcToken =
  | { kind: 'text'; text: string; start: number; end: number }
  | { kind: 'style'; style: IrcStyle; start: number; end: number }
  | { kind: 'color'; fg: number; bg?: number; start: number; end: number }
  | { kind: 'colorReset'; start: number; end: number }
  | { kind: 'reset'; start: number; end: number };

export interface FormatState {
  styles: Set<IrcStyle>;
  fg: number | null;
  bg: number | null;
}

export interface TextFormatConfig {
  palette: IrcPalette;
  spanFormat: SpanFormat;
  urlPattern: string; // Empty string disables link detection
  debug: boolean;
}

// Channel membership is provided by the embedding client; only the shape is declared here.
// Display layers sort members by the position of their prefix in the network's prefix
// list (prefix-less members last), then by case-insensitive name.
export interface IrcMember {
  name: string;
  prefix: string; // e.g. '@', '+', or '' for regular users
}

export interface IrcMemberSource {
  readonly members: readonly IrcMember[]; // In the order sent by the server
  find(name: string): IrcMember | undefined;
}
