export const GOAL_PROMPT = `Tell me the timestamp of every goal scored in this clip; only count it when the net moves.
There may be no goal, or more than one. Return only the list of goal timestamps, like this: [00:00:12, 00:00:29].
If there is no goal, return [].
IMPORTANT: do not output any character other than the list.`;

export const CHUNK_MIME_TYPE = 'video/mp4';
