export type ItemId = number;

export interface Item {
  id: ItemId;
  name: string;
  createdAt: Date;   // UTC, set once by the store
  isActive: boolean;
}

// Creation payload after binding; id and createdAt are assigned by the store
export interface NewItemInput {
  name: string;
  isActive: boolean;
}

// Wire shape shared by every JSON response that carries an item
export interface ItemJson {
  id: ItemId;
  name: string;
  createdAt: string;
  isActive?: boolean; // omitted when false
}

export function toItemJson(item: Item): ItemJson {
  const json: ItemJson = {
    id: item.id,
    name: item.name,
    createdAt: item.createdAt.toISOString(),
  };
  if (item.isActive) json.isActive = true;
  return json;
}
