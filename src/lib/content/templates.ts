import type { ContentCategory, Difficulty } from "../types.ts";

export const PLACEHOLDER = "{}";

export const TITLE_TEMPLATES: Record<ContentCategory, readonly string[]> = {
  tutorial: [
    "How to Build {} in {} Minutes",
    "Complete {} Tutorial for Beginners",
    "Master {} in {} Steps",
    "{} Explained Simply",
    "Build Your First {} Project",
  ],
  news: [
    "Breaking: {} Changes Everything",
    "Latest {} Updates You Need to Know",
    "{} News This Week",
    "Why {} is Trending Now",
    "The Future of {} is Here",
  ],
  comparison: [
    "{} vs {}: Which is Better?",
    "Comparing {} and {} in {}",
    "{} or {}? The Ultimate Guide",
    "Why {} Beats {} Every Time",
    "The Truth About {} vs {}",
  ],
  explanation: [
    "{} Explained in {} Minutes",
    "What is {}? Everything You Need to Know",
    "Understanding {} Once and For All",
    "The Science Behind {}",
    "How {} Actually Works",
  ],
  prediction: [
    "Why {} Will Dominate {}",
    "The Future of {} in {}",
    "{} Predictions for {}",
    "What's Next for {}?",
    "How {} Will Change {}",
  ],
  review: [
    "I Tested {} for {} Days",
    "{} Review: Is It Worth It?",
    "Honest {} Review After {} Months",
    "The Truth About {}",
    "{} Deep Dive Review",
  ],
};

export const THUMBNAIL_CONCEPTS: Partial<Record<ContentCategory, readonly string[]>> = {
  tutorial: [
    "Split-screen showing before/after code results",
    "Person pointing at code on a large screen",
    "Step-by-step visual progress bars",
    "Hand typing on keyboard with code overlay",
  ],
  news: [
    "Breaking news style with bold red background",
    "Tech headlines with shocked expression",
    "Trending arrows and news ticker style",
    "Professional news anchor setup",
  ],
  comparison: [
    "Split-screen VS layout with logos",
    "Two products side by side with checkmarks",
    "Battle-style confrontation design",
    "Pros and cons visual comparison",
  ],
  explanation: [
    "Complex diagram simplified with arrows",
    "Teacher-style whiteboard explanation",
    "Lightbulb moment with clear graphics",
    "Step-by-step visual breakdown",
  ],
  prediction: [
    "Futuristic crystal ball or fortune teller",
    "Timeline with future milestones",
    "Rocket ship or upward trending charts",
    "Calendar with highlighted future dates",
  ],
  review: [
    "Product with star ratings overlay",
    "Thumbs up/down with product image",
    "Before and after user experience",
    "Honest review with serious expression",
  ],
};

export const FALLBACK_THUMBNAIL_CONCEPTS = [
  "Clean, professional design with clear text",
];

export const BASE_VIEWS: Partial<Record<ContentCategory, number>> = {
  tutorial: 150_000,
  news: 200_000,
  comparison: 180_000,
  explanation: 120_000,
  prediction: 250_000,
  review: 100_000,
};

export const FALLBACK_BASE_VIEWS = 150_000;

export const BASE_DIFFICULTY: Partial<Record<ContentCategory, Difficulty>> = {
  tutorial: "Medium",
  news: "Easy",
  comparison: "Medium",
  explanation: "Hard",
  prediction: "Medium",
  review: "Easy",
};

export const CALLS_TO_ACTION: Partial<Record<ContentCategory, string>> = {
  tutorial: "Try building this yourself and share your results in the comments!",
  news: "What do you think about this development? Share your thoughts below!",
  comparison: "Which option do you prefer? Let me know in the comments!",
  explanation: "Did this help clarify the concept for you? Ask any questions below!",
  prediction: "Do you agree with my predictions? Share your thoughts!",
  review: "Are you planning to try this? Let me know what you think!",
};

export const FALLBACK_CALL_TO_ACTION =
  "What are your thoughts? Share them in the comments!";

export const TOPIC_ABBREVIATIONS: Record<string, string> = {
  ai: "AI",
  ml: "Machine Learning",
  nlp: "NLP",
  gpt: "GPT",
  llm: "Large Language Models",
};

export const POPULAR_AI_HASHTAGS = [
  "#AI",
  "#MachineLearning",
  "#Tech",
  "#Programming",
  "#Tutorial",
  "#Coding",
];

export const HASHTAG_TECH_KEYWORDS = ["ai", "ml", "tech", "coding", "tutorial"];

export const COMPLEXITY_WORDS = ["deep", "advanced", "complex", "science"];

export const KEY_TOPIC_KEYWORDS = [
  "ai",
  "artificial intelligence",
  "machine learning",
  "deep learning",
  "chatgpt",
  "gpt",
  "openai",
  "neural network",
  "automation",
  "python",
  "coding",
  "programming",
  "data science",
  "tensorflow",
  "pytorch",
  "computer vision",
  "nlp",
  "robotics",
];
