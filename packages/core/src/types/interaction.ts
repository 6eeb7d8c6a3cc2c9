export interface Interaction {
	id: string;
	userId: string;
	/** Logical reference to an item. Not enforced by the database. */
	todoId: string | null;
	interactionType: string;
	prompt: string;
	response: string | null;
	subtasksGenerated: number;
	modelUsed: string | null;
	createdAt: Date;
}

export interface AppendInteractionInput {
	userId: string;
	todoId?: string | null;
	interactionType: string;
	prompt: string;
	response?: string | null;
	subtasksGenerated?: number;
	modelUsed?: string | null;
}

export interface InteractionQuery {
	tenantKey: string;
	itemId?: string;
	interactionType?: string;
	limit?: number;
	offset?: number;
}
