import type { DeliveryChannel, QuizPoll } from '@quizcast/types';

type Writer = (line: string) => void;

// eslint-disable-next-line no-console
const defaultWriter: Writer = (line) => console.log(line);

/** Prints polls instead of publishing them; used for dry runs. */
export class ConsoleChannel implements DeliveryChannel {
  private readonly write: Writer;

  public constructor(write: Writer = defaultWriter) {
    this.write = write;
  }

  public async sendQuiz(poll: QuizPoll): Promise<void> {
    const lines = [`[QuizCast] Dry run poll: ${poll.question}`];
    poll.options.forEach((option, i) => {
      lines.push(`  ${i === poll.correctIndex ? '*' : '-'} ${option}`);
    });
    if (poll.explanation) lines.push(`  > ${poll.explanation}`);
    this.write(lines.join('\n'));
  }

  public async sendNotice(text: string): Promise<void> {
    this.write(`[QuizCast] Dry run notice: ${text}`);
  }
}
