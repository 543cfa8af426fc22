export interface AnonymousAnimal {
	emoji: string;
	name: string;
}

export const ANONYMOUS_ANIMALS: readonly AnonymousAnimal[] = Object.freeze([
	{ emoji: "🦊", name: "Fox" },
	{ emoji: "🐻", name: "Bear" },
	{ emoji: "🦁", name: "Lion" },
	{ emoji: "🐯", name: "Tiger" },
	{ emoji: "🦋", name: "Butterfly" },
	{ emoji: "🐢", name: "Turtle" },
	{ emoji: "🦉", name: "Owl" },
	{ emoji: "🐬", name: "Dolphin" },
	{ emoji: "🦅", name: "Eagle" },
	{ emoji: "🐺", name: "Wolf" },
	{ emoji: "🦌", name: "Deer" },
	{ emoji: "🐘", name: "Elephant" },
	{ emoji: "🦒", name: "Giraffe" },
	{ emoji: "🐼", name: "Panda" },
	{ emoji: "🦜", name: "Parrot" },
	{ emoji: "🐨", name: "Koala" },
	{ emoji: "🦩", name: "Flamingo" },
	{ emoji: "🐸", name: "Frog" },
	{ emoji: "🦔", name: "Hedgehog" },
	{ emoji: "🐿️", name: "Squirrel" },
	{ emoji: "🦭", name: "Seal" },
	{ emoji: "🐧", name: "Penguin" },
	{ emoji: "🦚", name: "Peacock" },
	{ emoji: "🐝", name: "Bee" },
	{ emoji: "🦎", name: "Lizard" },
	{ emoji: "🐙", name: "Octopus" },
	{ emoji: "🦀", name: "Crab" },
	{ emoji: "🐌", name: "Snail" }
]);

export interface AnonymousIdentity {
	animalIndex: number;
	animalEmoji: string;
	animalName: string;
	anonymousId: string;
}

/**
 * Picks the first animal nobody in the room holds. Once every animal is taken
 * a random one is reused with the student's ordinal appended.
 */
export function pickAnonymousIdentity(
	usedIndices: ReadonlySet<number>,
	studentCount: number,
	random: () => number = Math.random
): AnonymousIdentity {
	for (const [index, animal] of ANONYMOUS_ANIMALS.entries()) {
		if (!usedIndices.has(index)) {
			return toIdentity(index, animal.emoji, animal.name);
		}
	}

	const index = Math.min(
		ANONYMOUS_ANIMALS.length - 1,
		Math.floor(random() * ANONYMOUS_ANIMALS.length)
	);
	const animal = ANONYMOUS_ANIMALS[index];
	return toIdentity(index, animal.emoji, `${animal.name} ${studentCount + 1}`);
}

function toIdentity(animalIndex: number, animalEmoji: string, animalName: string): AnonymousIdentity {
	return {
		animalIndex,
		animalEmoji,
		animalName,
		anonymousId: `${animalEmoji} ${animalName}`
	};
}
