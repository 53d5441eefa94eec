/** A note as returned by the search provider, before it is bound to a task */
export interface SourceDocument {
  id: string;
  text: string;
  url: string;
}

export interface NoteDocument extends SourceDocument {
  taskId: number;
  createdAt: Date;
}
