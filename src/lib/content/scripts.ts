import { createLogger } from "../logger.ts";
import { CALLS_TO_ACTION, FALLBACK_CALL_TO_ACTION } from "./templates.ts";
import type { ContentCategory, ContentIdea, VideoScript } from "../types.ts";

const log = createLogger("scripts");

const WORDS_PER_MINUTE = 155;
const MAX_KEY_POINTS = 5;

const KEY_POINT_PREFIXES = ["Step ", "1.", "First,", "Second,", "Finally,"];
const KEY_PHRASES = ["important", "key", "main", "crucial", "essential"];

type ScriptTemplate = (title: string) => string;

const tutorialScript: ScriptTemplate = (title) => `
Welcome back! In this video we're going to ${title.toLowerCase()}.

New here? I make hands-on videos about AI and the tools around it, so subscribe and turn on notifications if that sounds useful.

Let's get straight into it. I'll take this one step at a time so you can follow along.

First, here's a look at the finished result so you know where we're heading. [SHOW DEMO]

Here's the plan, broken into steps:

Step 1: Preparing Your Environment
Before writing anything, make sure you have these installed...

Step 2: The Core Concepts
A quick look at the ideas everything else builds on...

Step 3: Building It
Time to write the code. I'll talk through every line...

Step 4: Testing and Fixing
Let's run it and deal with whatever breaks...

Step 5: Polishing
A few ways to make what we built faster and cleaner...

And we're done! You've built the whole thing from scratch.

If this helped, leave a like and subscribe for more AI tutorials. Questions, or a topic you want covered next? Put it in the comments.

Thanks for watching, see you in the next one!
`;

const newsScript: ScriptTemplate = (title) => `
Hey everyone! Big news today about ${title.toLowerCase()}.

AI moves fast, so if you want to keep up, make sure you're subscribed.

Here's what happened...

Why this matters: first, it means...

Second, it could change the way we...

The part that really stood out to me is...

So what does this mean for you? Here's how I see it...

Zooming out, this could lead to...

People across the industry are already reacting...

My honest take...

How do you feel about this? Excited, worried, somewhere in between? Tell me in the comments.

If this breakdown was useful, hit like and subscribe for more AI news as it happens.

Thanks for watching, catch you next time!
`;

const comparisonScript: ScriptTemplate = (title) => `
Hey everyone! Today we're finally answering it: ${title}

You've asked for this comparison a lot, so let's go through it properly.

First, a quick introduction to both contenders...

Here's how they stack up across the things that matter:

Performance:
Real-world tests first...

Ease of Use:
What it's actually like day to day...

Cost:
What you'll pay for each...

Features:
What each one gives you...

Use Cases:
When to reach for one over the other...

Putting all of that together, here's my verdict...

It comes down to what you need. For X, pick the first option. For Y, the second one wins.

Which one do you use, and why? Let me know in the comments.

Like the video if it helped you decide, and subscribe for more comparisons and reviews.

See you next time!
`;

const explanationScript: ScriptTemplate = (title) => `
Ever wondered about ${title.toLowerCase()}? Today we'll break it down so anyone can follow.

Welcome back to the channel, where complicated tech gets explained plainly. New here? Subscribe for more.

Let's start from the beginning. What is it, really?

An analogy makes this much easier...

This is where it gets interesting...

The key pieces are...

Here's how they fit together...

Why should you care? Because...

Where this shows up in the real world...

A few things people often get wrong...

And where it's heading next...

I hope that cleared things up. If anything is still fuzzy, ask in the comments and I'll answer.

Like the video if you learned something, and subscribe for more deep dives into AI and technology.

Thanks for watching!
`;

const predictionScript: ScriptTemplate = (title) => `
What if I told you: ${title.toLowerCase()}?

Today we're looking ahead, and some of these predictions might surprise you.

Forecasting where AI goes next is what this channel is about, so subscribe so you don't miss the follow-ups.

Based on what's happening right now, here's what I expect...

Here's the evidence behind that...

The big players are already getting ready for it...

My timeline looks like this...

These are the signals I'm watching...

There are a few ways this could play out...

Scenario 1: everything goes roughly to plan...

Scenario 2: a major breakthrough speeds things up...

Scenario 3: something gets in the way...

So how should you get ready?

My advice...

These are predictions, not promises. Nobody knows the future, but being prepared puts you ahead.

Agree or disagree? Tell me in the comments.

Like the video if you enjoy looking ahead with me, and subscribe for more AI predictions.

Until next time, keep looking forward!
`;

const reviewScript: ScriptTemplate = (title) => `
I've been using this for a few weeks, and here's my honest review of ${title.toLowerCase()}.

Quick reminder before we start: subscribe for tech reviews without the hype.

My first impressions...

What I really like...

What drove me up the wall...

Here's how it holds up in real use...

[DEMO/SCREEN RECORDING]

Price and value...

How it compares with the alternatives...

Who it's actually for...

My final verdict...

Pros:
- [Main strengths]

Cons:
- [Main weaknesses]

Overall score: X out of 10

Would I recommend it? Here's my answer...

That's the review. Got questions? Leave them in the comments and I'll reply.

If this helped you decide, like and subscribe for more honest reviews.

Thanks for watching!
`;

const generalScript: ScriptTemplate = (title) => `
Today we're talking about ${title}, and I think you'll find it really interesting.

Welcome back! If you're new, this channel is all about AI and technology, so subscribe for more.

Let me start with why this topic matters...

Here's what most people miss...

Let me break it down...

The implications are huge, because...

Here's a real example...

You might be thinking...

So what does this mean going forward?

My take...

I'd love to hear what you think, so leave a comment.

If this was worth your time, like and subscribe for more about AI and technology.

Thanks for watching, see you in the next one!
`;

const SCRIPT_TEMPLATES: Partial<Record<ContentCategory, ScriptTemplate>> = {
  tutorial: tutorialScript,
  news: newsScript,
  comparison: comparisonScript,
  explanation: explanationScript,
  prediction: predictionScript,
  review: reviewScript,
};

export type GenerateScriptsOptions = {
  count: number;
  now?: Date;
};

export function buildScript(category: ContentCategory, title: string): string {
  const template = SCRIPT_TEMPLATES[category] ?? generalScript;
  return template(title);
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter(Boolean).length;
}

export function estimateDuration(script: string): string {
  const minutes = countWords(script) / WORDS_PER_MINUTE;
  const whole = Math.floor(minutes);

  if (minutes < 1) return "< 1 minute";
  if (minutes < 5) return `${whole}-${whole + 1} minutes`;
  if (minutes < 10) return `${whole}-${whole + 2} minutes`;
  return `${whole}-${whole + 3} minutes`;
}

/**
 * Structured lines (steps, "First,", "Finally,") when the script has them,
 * otherwise sentences that use one of the key phrases.
 */
export function extractKeyPoints(script: string): string[] {
  const structured = script
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => KEY_POINT_PREFIXES.some((prefix) => line.startsWith(prefix)));

  if (structured.length > 0) {
    return structured.slice(0, MAX_KEY_POINTS);
  }

  return script
    .split(".")
    .filter((sentence) => {
      const lower = sentence.toLowerCase();
      return KEY_PHRASES.some((phrase) => lower.includes(phrase));
    })
    .map((sentence) => sentence.trim())
    .slice(0, MAX_KEY_POINTS);
}

export function callToAction(category: ContentCategory): string {
  return CALLS_TO_ACTION[category] ?? FALLBACK_CALL_TO_ACTION;
}

export function generateVideoScripts(
  ideas: ContentIdea[],
  options: GenerateScriptsOptions
): VideoScript[] {
  const createdAt = (options.now ?? new Date()).toISOString();

  const scripts = ideas.slice(0, Math.max(0, options.count)).map((idea, index) => {
    const script = buildScript(idea.category, idea.title);
    return {
      id: index + 1,
      title: idea.title,
      category: idea.category,
      script,
      hashtags: idea.hashtags,
      thumbnailConcept: idea.thumbnailConcept,
      estimatedDuration: estimateDuration(script),
      wordCount: countWords(script),
      keyPoints: extractKeyPoints(script),
      callToAction: callToAction(idea.category),
      createdAt,
    };
  });

  log.info({ scripts: scripts.length }, "Generated video scripts");
  return scripts;
}
